import * as cheerio from 'cheerio';
import { isCDATA, isComment, isDirective, isDocument, isTag, isText } from 'domhandler';
import type { AnyNode, ProcessingInstruction } from 'domhandler';
import {
  createComment,
  createDocument,
  createDoctype,
  createElement,
  createText,
  namespaceFromUri,
} from '../deltags/nodes';
import { RAW_TEXT_ELEMENTS } from '../deltags/serialize';
import type { ChildNode, DocumentRoot, SerializeOptions } from '../deltags/types';
import type { HtmlParser } from './types';

const DOCTYPE_PATTERN =
  /^!doctype(?:\s+([^\s"']+))?(?:\s+public\s+(["'])(.*?)\2(?:\s+(["'])(.*?)\4)?|\s+system\s+(["'])(.*?)\6)?/i;

/**
 * Both cheerio backends hand back a domhandler tree; this walks it into the
 * common document model.
 */
const convertChildren = (nodes: readonly AnyNode[]): ChildNode[] => {
  const children: ChildNode[] = [];
  for (const node of nodes) {
    children.push(...convertNode(node));
  }
  return children;
};

const convertNode = (node: AnyNode): ChildNode[] => {
  if (isTag(node)) {
    return [
      createElement(
        node.name,
        Object.entries(node.attribs).map(([name, value]) => ({ name, value })),
        convertChildren(node.children),
        // Only the parse5 tree adapter records a namespace
        namespaceFromUri(node.namespace)
      ),
    ];
  }
  if (isText(node)) {
    return [createText(node.data)];
  }
  if (isComment(node)) {
    return [createComment(node.data)];
  }
  if (isDirective(node)) {
    return [convertDirective(node)];
  }
  // parse5 stores <template> content as a nested document; CDATA only wraps text
  if (isDocument(node) || isCDATA(node)) {
    return convertChildren(node.children);
  }
  return [];
};

/**
 * `<!DOCTYPE ...>` becomes a doctype; any other `<?...>` or `<!...>`
 * directive is a bogus comment in HTML.
 */
const convertDirective = (node: ProcessingInstruction): ChildNode => {
  if (node.name.toLowerCase() !== '!doctype') {
    return createComment(node.data);
  }
  const match = DOCTYPE_PATTERN.exec(node.data);
  return createDoctype(
    match?.[1] ?? '',
    match?.[3] ?? '',
    match?.[5] ?? match?.[7] ?? ''
  );
};

// cheerio runs parse5 with scripting enabled, which makes <noscript> raw text
const PARSE5_SERIALIZATION: SerializeOptions = {
  rawTextElements: new Set([...RAW_TEXT_ELEMENTS, 'noscript']),
};

// htmlparser2 only keeps script and style undecoded, in any namespace, and
// never drops a leading newline
const HTMLPARSER2_SERIALIZATION: SerializeOptions = {
  rawTextElements: new Set(['script', 'style']),
  leadingNewlineElements: new Set<string>(),
};

/**
 * cheerio with its default parse5 backend: standards-compliant tree construction
 * without the cost of a full DOM.
 */
export class Parse5Parser implements HtmlParser {
  readonly id = 'parse5' as const;
  readonly description = 'parse5 (via cheerio): standards-compliant, no DOM overhead';
  readonly serialization = PARSE5_SERIALIZATION;

  parse(html: string): DocumentRoot {
    const $ = cheerio.load(html);
    return createDocument(convertChildren($.root().contents().toArray()));
  }
}

/**
 * cheerio with htmlparser2 in HTML mode: fastest and forgiving, but it does
 * not add the implied html/head/body elements.
 */
export class Htmlparser2Parser implements HtmlParser {
  readonly id = 'htmlparser2' as const;
  readonly description = 'htmlparser2 (via cheerio): fastest, forgiving, no implied elements';
  readonly serialization = HTMLPARSER2_SERIALIZATION;

  parse(html: string): DocumentRoot {
    const $ = cheerio.load(html, { xml: { xmlMode: false } });
    return createDocument(convertChildren($.root().contents().toArray()));
  }
}
