import { UnknownParserError } from '../errors';
import { parserLogger } from '../logger';
import { Htmlparser2Parser, Parse5Parser } from './CheerioParser';
import { JsdomParser } from './JsdomParser';
import type { HtmlParser, ParserId } from './types';

export type { HtmlParser, ParserId } from './types';
export { JsdomParser } from './JsdomParser';
export { Htmlparser2Parser, Parse5Parser } from './CheerioParser';

export const DEFAULT_PARSER: ParserId = 'jsdom';

export const PARSER_IDS: readonly ParserId[] = ['jsdom', 'parse5', 'htmlparser2'];

/**
 * Older parser names, mapped to the closest backend
 */
export const PARSER_ALIASES: Readonly<Record<string, ParserId>> = {
  'html5lib': 'jsdom',
  'html.parser': 'parse5',
  'lxml': 'htmlparser2',
};

const isParserId = (value: string): value is ParserId =>
  PARSER_IDS.some((id) => id === value);

/**
 * Resolve a parser id or alias (case-insensitive)
 */
export const resolveParserId = (name: string): ParserId => {
  const key = name.trim().toLowerCase();
  if (isParserId(key)) return key;

  const aliased = PARSER_ALIASES[key];
  if (aliased) {
    parserLogger.debug(`Parser alias '${key}' resolved to '${aliased}'`);
    return aliased;
  }

  throw new UnknownParserError(name, [...PARSER_IDS, ...Object.keys(PARSER_ALIASES)]);
};

const createParser = (id: ParserId): HtmlParser => {
  switch (id) {
    case 'jsdom':
      return new JsdomParser();
    case 'parse5':
      return new Parse5Parser();
    case 'htmlparser2':
      return new Htmlparser2Parser();
  }
};

/**
 * Get the parser for an id or alias, or pass a custom backend straight through
 */
export const getParser = (parser: string | HtmlParser = DEFAULT_PARSER): HtmlParser => {
  if (typeof parser !== 'string') return parser;
  return createParser(resolveParserId(parser));
};
