import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';

/**
 * Reads one field out of a listing container, or undefined when the
 * container has nothing usable for it
 */
export type FieldStrategy = (container: Cheerio<Element>) => string | undefined;

// Tried in order; the first selector with any match is the only one used
export const CONTAINER_SELECTORS: readonly string[] = [
  'div.oferta',
  'div.job-item',
  'article',
  'div.card',
  'li.list-item',
];

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function textOf(selector: string): FieldStrategy {
  return (container) => {
    const text = normalizeText(container.find(selector).first().text());
    return text.length > 0 ? text : undefined;
  };
}

function hrefOf(selector: string): FieldStrategy {
  return (container) => {
    for (const anchor of container.find(selector).toArray()) {
      const href = anchor.attribs.href?.trim();
      if (href) return href;
    }
    return undefined;
  };
}

export const TITLE_STRATEGIES: readonly FieldStrategy[] = [
  textOf('h2, h3, h4, h5'),
  textOf('a.titulo'),
  textOf('strong'),
];

export const EMPLOYER_STRATEGIES: readonly FieldStrategy[] = [
  textOf('.empresa, .company, .empleador, .organismo'),
];

export const LOCATION_STRATEGIES: readonly FieldStrategy[] = [
  textOf('.ubicacion, .location, .localidad, .lugar'),
];

export const LINK_STRATEGIES: readonly FieldStrategy[] = [
  hrefOf('a[href]'),
];

/**
 * Applies strategies in order; the first non-empty result wins
 */
export function resolveField(
  container: Cheerio<Element>,
  strategies: readonly FieldStrategy[]
): string | undefined {
  for (const strategy of strategies) {
    const value = strategy(container);
    if (value) return value;
  }
  return undefined;
}
