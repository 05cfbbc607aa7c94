import { describe, it, expect } from 'vitest';
import { formatRunSummary, formatTimestamp } from '../src/services/summary';
import { makeListing } from './helpers/listings';

const RULE = '='.repeat(70);
const at = new Date(2026, 9, 18, 9, 5, 3);

describe('formatTimestamp', () => {
  it('pads every component', () => {
    expect(formatTimestamp(at)).toBe('2026-10-18 09:05:03');
  });
});

describe('formatRunSummary', () => {
  it('lists new listings', () => {
    const listing = makeListing('Electricista', 'Cooperativa', {
      location: 'Esperanza',
      link: 'https://www.santafe.gob.ar/ofertas/8',
    });

    expect(formatRunSummary({ at, total: 3, newListings: [listing], previousCount: 2 })).toEqual([
      RULE,
      'RESUMEN DE MONITOREO - 2026-10-18 09:05:03',
      RULE,
      'Ofertas totales en el portal: 3',
      'Ofertas nuevas detectadas: 1',
      'Ofertas ya conocidas: 2',
      '',
      'NUEVAS OFERTAS:',
      '',
      '1. Electricista',
      '   Empresa: Cooperativa',
      '   Ubicación: Esperanza',
      '   Link: https://www.santafe.gob.ar/ofertas/8',
      '',
      RULE,
    ]);
  });

  it('says so when nothing is new', () => {
    const lines = formatRunSummary({ at, total: 2, newListings: [], previousCount: 2 });

    expect(lines.slice(4, 9)).toEqual([
      'Ofertas nuevas detectadas: 0',
      'Ofertas ya conocidas: 2',
      '',
      'No se detectaron nuevas ofertas en esta ejecución.',
      '',
    ]);
  });
});
