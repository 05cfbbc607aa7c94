import type { ListingRecord } from '../types/listing';

const RULE = '='.repeat(70);

export interface RunSummaryInput {
  at: Date;
  total: number;
  newListings: readonly ListingRecord[];
  previousCount: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatRunSummary(input: RunSummaryInput): string[] {
  const lines = [
    RULE,
    `RESUMEN DE MONITOREO - ${formatTimestamp(input.at)}`,
    RULE,
    `Ofertas totales en el portal: ${input.total}`,
    `Ofertas nuevas detectadas: ${input.newListings.length}`,
    `Ofertas ya conocidas: ${input.previousCount}`,
    '',
  ];

  if (input.newListings.length > 0) {
    lines.push('NUEVAS OFERTAS:');
    input.newListings.forEach((listing, i) => {
      lines.push(
        '',
        `${i + 1}. ${listing.title}`,
        `   Empresa: ${listing.employer}`,
        `   Ubicación: ${listing.location}`,
        `   Link: ${listing.link}`
      );
    });
  } else {
    lines.push('No se detectaron nuevas ofertas en esta ejecución.');
  }

  lines.push('', RULE);
  return lines;
}
