// Core types for the document tree and removal rules

export interface Attribute {
  readonly name: string;
  readonly value: string;
}

export interface DocumentRoot {
  readonly kind: 'document';
  readonly children: readonly ChildNode[];
}

/** Element namespace as the parser assigned it */
export type Namespace = 'html' | 'svg' | 'mathml';

export interface ElementNode {
  readonly kind: 'element';
  /** Tag name as the parser reported it (lower case for HTML, camelCase survives for SVG) */
  readonly tagName: string;
  readonly namespace: Namespace;
  readonly attributes: readonly Attribute[];
  readonly children: readonly ChildNode[];
}

export interface TextNode {
  readonly kind: 'text';
  readonly value: string;
}

export interface CommentNode {
  readonly kind: 'comment';
  readonly value: string;
}

export interface DoctypeNode {
  readonly kind: 'doctype';
  readonly name: string;
  readonly publicId: string;
  readonly systemId: string;
}

export type ChildNode = ElementNode | TextNode | CommentNode | DoctypeNode;

export type DocumentNode = DocumentRoot | ChildNode;

export type ParentNode = DocumentRoot | ElementNode;

/**
 * Where a keyword rule looks for its keyword.
 * - text: the element's text content
 * - class: the element's class attribute
 * - attributes: every attribute value, joined by a space
 */
export const keywordScopes = ['text', 'class', 'attributes'] as const;

export type KeywordScope = typeof keywordScopes[number];

export interface KeywordRule {
  readonly tagName: string;
  readonly keyword: string;
}

export interface RuleSetOptions {
  keywordScope?: KeywordScope;
}

/**
 * How a parser tokenized element content, so output can be re-parsed into the
 * same tree.
 */
export interface SerializeOptions {
  /** HTML elements whose text the parser kept undecoded */
  rawTextElements?: ReadonlySet<string>;
  /** HTML elements where the parser drops a newline right after the start tag */
  leadingNewlineElements?: ReadonlySet<string>;
}

/** An `<a>` element's target and trimmed text */
export interface Link {
  readonly href: string;
  readonly text: string;
}

export interface FilterStats {
  /** Removed element count keyed by lower-cased tag name (outermost removals only) */
  removedElements: Record<string, number>;
  removedComments: number;
}

export interface FilterResult {
  document: DocumentRoot;
  stats: FilterStats;
}
