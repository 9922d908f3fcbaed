import { JSDOM } from 'jsdom';
import type { DOMWindow } from 'jsdom';
import {
  createComment,
  createDocument,
  createDoctype,
  createElement,
  createText,
  namespaceFromUri,
} from '../deltags/nodes';
import type { ChildNode, DocumentRoot } from '../deltags/types';
import type { HtmlParser } from './types';

/**
 * Browser-grade parsing through jsdom. Always yields html/head/body, like a
 * browser would. Scripts never run, so `<noscript>` holds ordinary markup and
 * the default serialization applies.
 */
export class JsdomParser implements HtmlParser {
  readonly id = 'jsdom' as const;
  readonly description = 'jsdom: WHATWG-conformant, most tolerant, slowest';

  parse(html: string): DocumentRoot {
    const dom = new JSDOM(html);
    const { window } = dom;
    try {
      return createDocument(convertChildren(window.document.childNodes, window));
    } finally {
      window.close();
    }
  }
}

const convertChildren = (nodes: Iterable<Node>, window: DOMWindow): ChildNode[] => {
  const children: ChildNode[] = [];
  for (const node of nodes) {
    const converted = convertNode(node, window);
    if (converted) children.push(converted);
  }
  return children;
};

const convertNode = (node: Node, window: DOMWindow): ChildNode | null => {
  if (node instanceof window.Element) {
    const content = node instanceof window.HTMLTemplateElement
      ? node.content.childNodes
      : node.childNodes;
    return createElement(
      node.localName,
      Array.from(node.attributes, (attr) => ({ name: attr.name, value: attr.value })),
      convertChildren(content, window),
      namespaceFromUri(node.namespaceURI)
    );
  }
  // CDATASection is a Text subclass
  if (node instanceof window.Text) {
    return createText(node.data);
  }
  if (node instanceof window.Comment) {
    return createComment(node.data);
  }
  if (node instanceof window.DocumentType) {
    return createDoctype(node.name, node.publicId, node.systemId);
  }
  // Processing instructions do not occur in HTML documents
  return null;
};
