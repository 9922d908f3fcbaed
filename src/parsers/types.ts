// Parser backend contract

import type { DocumentRoot, SerializeOptions } from '../deltags/types';

export type ParserId = 'jsdom' | 'parse5' | 'htmlparser2';

/**
 * Turns HTML text into the common document tree. Backends differ in speed and
 * error tolerance, never in the shape of what they return.
 * They do differ in which elements hold raw text, which `serialization`
 * records.
 */
export interface HtmlParser {
  readonly id: ParserId;
  readonly description: string;
  /** How this backend tokenizes element content; browser defaults when left out */
  readonly serialization?: SerializeOptions;
  parse(html: string): DocumentRoot;
}
