/**
 * html-deltags
 *
 * Removes chosen elements and every comment from an HTML document and
 * re-serializes what is left as compact HTML.
 */

import { getRunDefaults } from './config';
import { RuleSet, RuleSetBuilder } from './deltags/ruleSet';
import { serialize } from './deltags/serialize';
import { extractLinks, formatLink } from './deltags/links';
import { filterTreeWithStats } from './deltags/treeFilter';
import type { KeywordRule, KeywordScope, Link } from './deltags/types';
import { readInput, writeOutput } from './io';
import type { InputSource, OutputSink } from './io';
import { coreLogger } from './logger';
import { getParser } from './parsers';
import type { HtmlParser } from './parsers';

export interface RuleOptions {
  /** Tag groups, each a comma-separated list such as `script,style` */
  deleteTags?: readonly string[];
  /** `[tag, keyword]` pairs, or `"tag keyword"` strings as the CLI takes them */
  keywordRules?: ReadonlyArray<readonly [string, string] | KeywordRule | string>;
  keywordScope?: KeywordScope;
}

export interface DeltagOptions extends RuleOptions {
  /** Parser id, alias, or a custom backend */
  parser?: string | HtmlParser;
}

export interface HtmlDeltagsOptions extends DeltagOptions {
  input: InputSource;
  /** Where to write the result; when left out the result is only returned */
  output?: OutputSink;
}

/**
 * Build the rule set for a run. Throws InvalidRuleError on a keyword rule
 * without a tag name.
 */
export const buildRuleSet = (options: RuleOptions = {}): RuleSet => {
  const builder = new RuleSetBuilder();

  for (const group of options.deleteTags ?? []) {
    builder.addTagList(group);
  }

  for (const rule of options.keywordRules ?? []) {
    if (typeof rule === 'string') {
      builder.addKeywordSpec(rule);
    } else if ('tagName' in rule) {
      builder.addKeywordRule(rule.tagName, rule.keyword);
    } else {
      builder.addKeywordRule(rule[0], rule[1]);
    }
  }

  return builder.build({ keywordScope: options.keywordScope ?? getRunDefaults().keywordScope });
};

/**
 * Parse, filter and serialize with a prepared rule set
 */
export const deltagWithRules = (html: string, rules: RuleSet, parser: HtmlParser): string => {
  const { document } = filterTreeWithStats(parser.parse(html), rules);
  return serialize(document, parser.serialization);
};

/**
 * Synchronous in-memory entry point
 */
export const deltagHtml = (html: string, options: DeltagOptions = {}): string => {
  const rules = buildRuleSet(options);
  const parser = getParser(options.parser ?? getRunDefaults().parser);
  return deltagWithRules(html, rules, parser);
};

/**
 * Read `input`, strip it and write the result to `output`. Rules and parser are
 * resolved before the input is read, and nothing is written unless the whole
 * document serialized.
 */
export const htmlDeltags = async (options: HtmlDeltagsOptions): Promise<string> => {
  const rules = buildRuleSet(options);
  const parser = getParser(options.parser ?? getRunDefaults().parser);

  coreLogger.info('Running', {
    parser: parser.id,
    tags: [...rules.tagNames],
    keywordRules: rules.keywordRules.length,
    keywordScope: rules.keywordScope,
  });

  const html = await readInput(options.input);
  const result = deltagWithRules(html, rules, parser);

  if (options.output !== undefined) {
    await writeOutput(options.output, result);
  }

  return result;
};

export interface LinkOptions {
  /** Parser id, alias, or a custom backend */
  parser?: string | HtmlParser;
}

export interface HtmlExtractLinksOptions extends LinkOptions {
  input: InputSource;
  /** Where to write one `Link: [text](href)` line per link */
  output?: OutputSink;
}

/**
 * The links of an HTML document, see {@link extractLinks}
 */
export const extractLinksFromHtml = (html: string, options: LinkOptions = {}): Link[] => {
  const parser = getParser(options.parser ?? getRunDefaults().parser);
  return extractLinks(parser.parse(html));
};

/**
 * Read `input` and write its links to `output`, one line each
 */
export const htmlExtractLinks = async (options: HtmlExtractLinksOptions): Promise<Link[]> => {
  const parser = getParser(options.parser ?? getRunDefaults().parser);
  const html = await readInput(options.input);
  const links = extractLinks(parser.parse(html));

  coreLogger.info('Extracted links', { parser: parser.id, links: links.length });

  if (options.output !== undefined) {
    await writeOutput(options.output, links.map((link) => `${formatLink(link)}\n`).join(''));
  }

  return links;
};

export { RuleSet, RuleSetBuilder, parseKeywordSpec } from './deltags/ruleSet';
export { extractLinks, formatLink } from './deltags/links';
export { filterTree, filterTreeWithStats } from './deltags/treeFilter';
export { serialize, escapeAttribute, escapeText } from './deltags/serialize';
export {
  createComment,
  createDoctype,
  createDocument,
  createElement,
  createText,
  textContent,
  walk,
} from './deltags/nodes';
export { getParser, resolveParserId, PARSER_IDS, PARSER_ALIASES, DEFAULT_PARSER } from './parsers';
export type { HtmlParser, ParserId } from './parsers';
export { ConfigError, DeltagsError, InvalidRuleError, UnknownParserError, UsageError } from './errors';
export type { InputSource, OutputSink } from './io';
export { keywordScopes } from './deltags/types';
export type {
  Attribute,
  ChildNode,
  CommentNode,
  DoctypeNode,
  DocumentNode,
  DocumentRoot,
  ElementNode,
  FilterResult,
  FilterStats,
  KeywordRule,
  KeywordScope,
  Link,
  Namespace,
  RuleSetOptions,
  SerializeOptions,
  TextNode,
} from './deltags/types';
