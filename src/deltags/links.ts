import { getAttribute, isElement, textContent, walk } from './nodes';
import type { DocumentNode, Link } from './types';

/**
 * Every `<a>` under `node` in document order, with its `href` ('' when absent)
 * and trimmed text. Anchors without text are skipped.
 */
export const extractLinks = (node: DocumentNode): Link[] => {
  const links: Link[] = [];
  for (const descendant of walk(node)) {
    if (!isElement(descendant) || descendant.tagName.toLowerCase() !== 'a') continue;

    const text = textContent(descendant).trim();
    if (text) {
      links.push({ href: getAttribute(descendant, 'href') ?? '', text });
    }
  }
  return links;
};

/**
 * `Link: [text](href)`, with line breaks in the text written as `\n`
 */
export const formatLink = (link: Link): string =>
  `Link: [${link.text.replace(/\r\n|\r|\n/g, '\\n')}](${link.href})`;
