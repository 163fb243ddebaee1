/**
 * Section Locator Service
 * Finds named regions of an event detail page with ordered, first-match-wins probes
 */
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

export type SectionKind = 'subtitle' | 'content-body' | 'raw-details';

export type Fragment = cheerio.Cheerio<Element>;

/**
 * A single lookup strategy. Returns null on a miss.
 */
export type SectionProbe = ($: cheerio.CheerioAPI) => Fragment | null;

export const SUBTITLE_SELECTOR = 'div.event-subtitle';

export const DETAILS_CONTAINER_SELECTORS = ['.events-detail-main', '.event-details-main'];

export const DETAILS_HEADER_SELECTOR = 'h2.details';

/** Wrappers that hold the body text after the details header, highest priority first */
export const CONTENT_WRAPPER_SELECTORS = [
  '.field--name-field-ps-body',
  '.text-formatted',
  '.field__item',
  '.tex2jax_process',
];

export const GENERIC_CONTENT_SELECTORS = [
  '.event-description',
  '.event-body',
  '.event-content',
  '.field--name-body',
  '#event-description',
  '#event-content',
  'article',
];

function present(fragment: Fragment): Fragment | null {
  return fragment.length > 0 ? fragment : null;
}

/**
 * Probe matching the first element for `selector`
 */
export function selectorProbe(selector: string): SectionProbe {
  return ($) => present($.root().find(selector).first());
}

/**
 * First probe that hits wins
 */
export function firstMatch(probes: readonly SectionProbe[]): SectionProbe {
  return ($) => {
    for (const probe of probes) {
      const fragment = probe($);
      if (fragment) return fragment;
    }
    return null;
  };
}

const detailsContainerProbe = firstMatch(DETAILS_CONTAINER_SELECTORS.map(selectorProbe));

/**
 * Content after the details header inside the details container.
 * Falls back to the container itself when there is no header.
 */
export const detailsBodyProbe: SectionProbe = ($) => {
  const container = detailsContainerProbe($);
  if (!container) return null;

  const header = present(container.find(DETAILS_HEADER_SELECTOR).first());
  if (!header) return container;

  const siblings = header.nextAll();
  for (const selector of CONTENT_WRAPPER_SELECTORS) {
    const direct = present(siblings.filter(selector).first());
    if (direct) return direct;

    const nested = present(siblings.find(selector).first());
    if (nested) return nested;
  }

  return present(siblings.filter('div, section, article').first()) ?? container;
};

const PROBES: Record<SectionKind, SectionProbe> = {
  subtitle: selectorProbe(SUBTITLE_SELECTOR),
  'raw-details': detailsContainerProbe,
  'content-body': firstMatch([detailsBodyProbe, ...GENERIC_CONTENT_SELECTORS.map(selectorProbe)]),
};

/**
 * Locate a section of the page, or null when no probe matches
 */
export function locateSection($: cheerio.CheerioAPI, kind: SectionKind): Fragment | null {
  return PROBES[kind]($);
}
