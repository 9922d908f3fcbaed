import type {
  Attribute,
  ChildNode,
  CommentNode,
  DoctypeNode,
  DocumentNode,
  DocumentRoot,
  ElementNode,
  Namespace,
  ParentNode,
  TextNode,
} from './types';

/* ------------------------------------------------------------------ */
/*  Constructors                                                       */
/* ------------------------------------------------------------------ */

export const createDocument = (children: readonly ChildNode[] = []): DocumentRoot => ({
  kind: 'document',
  children,
});

const isAttributeList = (
  attributes: readonly Attribute[] | Record<string, string>
): attributes is readonly Attribute[] => Array.isArray(attributes);

export const createElement = (
  tagName: string,
  attributes: readonly Attribute[] | Record<string, string> = [],
  children: readonly ChildNode[] = [],
  namespace: Namespace = 'html'
): ElementNode => ({
  kind: 'element',
  tagName,
  namespace,
  attributes: isAttributeList(attributes)
    ? attributes
    : Object.entries(attributes).map(([name, value]) => ({ name, value })),
  children,
});

export const createText = (value: string): TextNode => ({ kind: 'text', value });

export const createComment = (value: string): CommentNode => ({ kind: 'comment', value });

export const createDoctype = (name: string, publicId = '', systemId = ''): DoctypeNode => ({
  kind: 'doctype',
  name,
  publicId,
  systemId,
});

const NAMESPACE_URIS: Readonly<Record<string, Namespace>> = {
  'http://www.w3.org/1999/xhtml': 'html',
  'http://www.w3.org/2000/svg': 'svg',
  'http://www.w3.org/1998/Math/MathML': 'mathml',
};

/**
 * Map a namespace URI to a {@link Namespace}; anything unknown or missing is HTML
 */
export const namespaceFromUri = (uri: string | null | undefined): Namespace =>
  (uri && NAMESPACE_URIS[uri]) || 'html';

/* ------------------------------------------------------------------ */
/*  Queries                                                            */
/* ------------------------------------------------------------------ */

export const isElement = (node: DocumentNode): node is ElementNode => node.kind === 'element';

export const isParent = (node: DocumentNode): node is ParentNode =>
  node.kind === 'document' || node.kind === 'element';

export const getAttribute = (element: ElementNode, name: string): string | undefined => {
  const lower = name.toLowerCase();
  return element.attributes.find((attr) => attr.name.toLowerCase() === lower)?.value;
};

// Nodes are immutable, so a computed text never goes stale
const textCache = new WeakMap<DocumentNode, string>();

/**
 * Concatenated text of a node and its descendants. Comments and doctypes
 * contribute nothing.
 */
export const textContent = (node: DocumentNode): string => {
  switch (node.kind) {
    case 'text':
      return node.value;
    case 'comment':
    case 'doctype':
      return '';
    default: {
      const cached = textCache.get(node);
      if (cached !== undefined) return cached;
      const text = node.children.map(textContent).join('');
      textCache.set(node, text);
      return text;
    }
  }
};

/**
 * Depth-first, document-order iteration over a node and all its descendants
 */
export function* walk(node: DocumentNode): Generator<DocumentNode> {
  yield node;
  if (isParent(node)) {
    for (const child of node.children) {
      yield* walk(child);
    }
  }
}
