/**
 * Content Serializer Service
 * Renders a located page fragment as plain text, Markdown or inner HTML
 */
import * as cheerio from 'cheerio';
import TurndownService from 'turndown';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { ContentFormat } from '../types/index';

const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'figure',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'td',
  'th',
  'tr',
  'ul',
]);

/**
 * Turndown configured for event body text
 */
export function createTurndownService(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    emDelimiter: '*',
    bulletListMarker: '-',
  });

  // keep machine-readable times next to their label
  service.addRule('preserveEventTimes', {
    filter: 'time',
    replacement: (content, node) => {
      const datetime = 'getAttribute' in node ? node.getAttribute('datetime') : null;
      return datetime ? `${content} (${datetime})` : content;
    },
  });

  return service;
}

const turndownService = createTurndownService();

function collectText(nodes: readonly AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (isTag(node)) {
      if (node.name === 'br') {
        out.push('\n');
        continue;
      }
      const block = BLOCK_TAGS.has(node.name);
      if (block) out.push('\n\n');
      collectText(node.children, out);
      if (block) out.push('\n\n');
    }
  }
}

/**
 * Collapse blank-line runs to one blank line and trim the ends
 */
export function collapseBlankLines(value: string): string {
  return value.replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * Plain text with paragraphs separated by blank lines
 */
export function fragmentToText(fragment: cheerio.Cheerio<Element>): string {
  const parts: string[] = [];
  collectText(fragment.toArray(), parts);

  const lines = parts
    .join('')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim());

  return collapseBlankLines(lines.join('\n'));
}

export function fragmentToMarkdown(fragment: cheerio.Cheerio<Element>): string {
  let markdown: string;
  try {
    markdown = turndownService.turndown(fragment.html() ?? '');
  } catch {
    return fragmentToText(fragment);
  }
  return collapseBlankLines(markdown);
}

/**
 * Inner HTML of the fragment, or its outer HTML when that is unavailable
 */
export function fragmentToHtml($: cheerio.CheerioAPI, fragment: cheerio.Cheerio<Element>): string {
  try {
    const inner = fragment.html();
    if (inner !== null) {
      return inner.trim();
    }
  } catch {
    // fall through to the wrapper markup
  }
  return $.html(fragment).trim();
}

/**
 * Serialize a fragment. Script and style elements are removed first.
 */
export function serializeFragment(
  $: cheerio.CheerioAPI,
  fragment: cheerio.Cheerio<Element>,
  format: ContentFormat
): string {
  fragment.find('script, style').remove();

  switch (format) {
    case 'markdown':
      return fragmentToMarkdown(fragment);
    case 'html':
      return fragmentToHtml($, fragment);
    default:
      return fragmentToText(fragment);
  }
}
