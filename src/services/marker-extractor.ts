/**
 * Marker Extractor Service
 * Pulls a labelled section ("Abstract", "Bio") out of raw event-details HTML.
 *
 * The marker is found as, in order:
 *   1. a text node containing `Marker:` (case-sensitive)
 *   2. a text node containing the marker word whose enclosing block contains `marker:`
 *      (covers `<b>Bio</b>: ...`)
 *   3. an h1-h6 whose whole text is the marker
 *
 * Colon matches return the rest of the element holding the marker. A heading that
 * holds the marker, and heading matches, collect the following siblings up to the
 * next heading. Only the first occurrence is used.
 */
import * as cheerio from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element, Text } from 'domhandler';
import { collapseWhitespace } from '../utils/text';
import { fragmentToText } from './content-serializer';

const BLOCK_ANCESTORS = new Set(['p', 'div', 'section', 'article']);
const HEADING_PATTERN = /^h[1-6]$/;

function collectTextNodes(nodes: readonly AnyNode[], out: Text[]): Text[] {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node);
    } else if (isTag(node)) {
      collectTextNodes(node.children, out);
    }
  }
  return out;
}

function nearestBlock(node: AnyNode): Element | null {
  let current = node.parent;
  while (current) {
    if (isTag(current) && BLOCK_ANCESTORS.has(current.name)) {
      return current;
    }
    current = current.parent;
  }
  return null;
}

function isHeading(node: AnyNode): boolean {
  return isTag(node) && HEADING_PATTERN.test(node.name);
}

/**
 * Single-line text of an element, with block boundaries kept as spaces
 */
function elementText($: cheerio.CheerioAPI, element: Element): string {
  return collapseWhitespace(fragmentToText($(element)));
}

/**
 * Text after `pattern` in `text`, matched case-insensitively when `foldCase` is set
 */
function textAfter(text: string, pattern: string, foldCase: boolean): string | null {
  const index = foldCase ? text.toLowerCase().indexOf(pattern.toLowerCase()) : text.indexOf(pattern);
  return index === -1 ? null : text.slice(index + pattern.length).trim();
}

function followingSection($: cheerio.CheerioAPI, heading: Element): string {
  const fragments: string[] = [];
  for (let sibling = heading.nextSibling; sibling; sibling = sibling.nextSibling) {
    if (isHeading(sibling)) break;

    let text = '';
    if (isText(sibling)) {
      text = collapseWhitespace(sibling.data);
    } else if (isTag(sibling)) {
      text = elementText($, sibling);
    }
    if (text) fragments.push(text);
  }

  return fragments.join(' ').trim();
}

/**
 * Rest of `element` after the marker. A bare `Marker:` heading introduces its siblings.
 */
function sectionAfter(
  $: cheerio.CheerioAPI,
  element: Element,
  pattern: string,
  foldCase: boolean
): string | null {
  const after = textAfter(elementText($, element), pattern, foldCase);
  if (after === '' && isHeading(element)) {
    return followingSection($, element);
  }
  return after;
}

function findExactColonMarker($: cheerio.CheerioAPI, textNodes: Text[], marker: string): string | null {
  const pattern = `${marker}:`;
  const node = textNodes.find((candidate) => candidate.data.includes(pattern));
  if (!node) return null;

  if (node.parent && isTag(node.parent)) {
    return sectionAfter($, node.parent, pattern, false);
  }
  return textAfter(collapseWhitespace(node.data), pattern, false);
}

function findWrappedColonMarker($: cheerio.CheerioAPI, textNodes: Text[], marker: string): string | null {
  const word = marker.toLowerCase();
  const pattern = `${word}:`;

  for (const node of textNodes) {
    if (!node.data.toLowerCase().includes(word)) continue;

    const parent = node.parent && isTag(node.parent) ? node.parent : null;
    if (parent) {
      const own = sectionAfter($, parent, pattern, true);
      if (own !== null) return own;
    }

    // `<b>Bio</b>: ...` keeps the colon outside the marker's own element
    const block = nearestBlock(node);
    if (!block || block === parent) continue;

    const after = sectionAfter($, block, pattern, true);
    if (after !== null) return after;
  }

  return null;
}

function findHeadingMarker($: cheerio.CheerioAPI, marker: string): string | null {
  const word = marker.toLowerCase();
  const heading = $.root()
    .find('h1, h2, h3, h4, h5, h6')
    .toArray()
    .find((element) => collapseWhitespace($(element).text()).toLowerCase() === word);
  if (!heading) return null;

  return followingSection($, heading);
}

/**
 * Extract the section introduced by `marker`, or "" when there is none
 */
export function extractMarkedSection(rawHtml: string, marker: string): string {
  if (!rawHtml || !rawHtml.trim()) {
    return '';
  }

  const $ = cheerio.load(rawHtml, null, false);
  const textNodes = collectTextNodes($.root().contents().toArray(), []);

  return (
    findExactColonMarker($, textNodes, marker) ??
    findWrappedColonMarker($, textNodes, marker) ??
    findHeadingMarker($, marker) ??
    ''
  );
}

export function extractAbstract(rawHtml: string): string {
  return extractMarkedSection(rawHtml, 'Abstract');
}

export function extractBio(rawHtml: string): string {
  return extractMarkedSection(rawHtml, 'Bio');
}
