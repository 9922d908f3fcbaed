import type { Attribute, DoctypeNode, DocumentNode, ElementNode, SerializeOptions } from './types';

/**
 * Elements that never have content or an end tag
 */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area', 'base', 'basefont', 'bgsound', 'br', 'col', 'embed', 'frame', 'hr',
  'img', 'input', 'keygen', 'link', 'meta', 'param', 'source', 'track', 'wbr',
]);

/**
 * HTML elements a browser tokenizer reads as raw text with scripting
 * disabled. Their text is never entity-decoded, so it is written back as is.
 */
export const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set([
  'iframe', 'noembed', 'noframes', 'plaintext', 'script', 'style', 'xmp',
]);

/**
 * HTML elements whose first newline a browser tokenizer swallows
 */
export const LEADING_NEWLINE_ELEMENTS: ReadonlySet<string> = new Set([
  'listing', 'pre', 'textarea',
]);

interface RenderContext {
  rawText: ReadonlySet<string>;
  leadingNewline: ReadonlySet<string>;
}

/* ------------------------------------------------------------------ */
/*  Escaping                                                           */
/* ------------------------------------------------------------------ */

export const escapeText = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export const escapeAttribute = (value: string): string =>
  escapeText(value).replace(/"/g, '&quot;');

/* ------------------------------------------------------------------ */
/*  Rendering                                                          */
/* ------------------------------------------------------------------ */

const renderAttributes = (attributes: readonly Attribute[]): string =>
  attributes.map((attr) => ` ${attr.name}="${escapeAttribute(attr.value)}"`).join('');

const renderDoctype = (doctype: DoctypeNode): string => {
  let out = doctype.name ? `<!DOCTYPE ${doctype.name}` : '<!DOCTYPE';
  if (doctype.publicId) {
    out += ` PUBLIC "${doctype.publicId}"`;
    if (doctype.systemId) out += ` "${doctype.systemId}"`;
  } else if (doctype.systemId) {
    out += ` SYSTEM "${doctype.systemId}"`;
  }
  return `${out}>`;
};

const renderElement = (element: ElementNode, context: RenderContext): string => {
  const tag = element.tagName;
  const lower = tag.toLowerCase();
  const html = element.namespace === 'html';
  const open = `<${tag}${renderAttributes(element.attributes)}>`;

  if (html && VOID_ELEMENTS.has(lower)) return open;

  // Foreign elements (svg, math) always hold ordinary, decoded text
  const raw = html && context.rawText.has(lower);
  let inner = element.children
    .map((child) => (raw && child.kind === 'text' ? child.value : render(child, context)))
    .join('');

  const [first] = element.children;
  if (
    html &&
    context.leadingNewline.has(lower) &&
    first?.kind === 'text' &&
    first.value.startsWith('\n')
  ) {
    inner = `\n${inner}`;
  }

  return `${open}${inner}</${tag}>`;
};

const render = (node: DocumentNode, context: RenderContext): string => {
  switch (node.kind) {
    case 'document':
      return node.children.map((child) => render(child, context)).join('');
    case 'element':
      return renderElement(node, context);
    case 'text':
      return escapeText(node.value);
    case 'comment':
      return `<!--${node.value}-->`;
    case 'doctype':
      return renderDoctype(node);
  }
};

/**
 * Render a tree as minimal HTML: no indentation and no line breaks other than
 * those inside preserved text. Pass the parser's `serialization` options so
 * that the output parses back into the same tree; the defaults follow a
 * browser with scripting disabled.
 */
export const serialize = (node: DocumentNode, options: SerializeOptions = {}): string =>
  render(node, {
    rawText: options.rawTextElements ?? RAW_TEXT_ELEMENTS,
    leadingNewline: options.leadingNewlineElements ?? LEADING_NEWLINE_ELEMENTS,
  });
