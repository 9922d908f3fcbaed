import { InvalidRuleError } from '../errors';
import { getAttribute, isElement, textContent } from './nodes';
import type {
  DocumentNode,
  ElementNode,
  KeywordRule,
  KeywordScope,
  RuleSetOptions,
} from './types';

/**
 * `-d` pseudo-tags that ask for comment removal. Comments are always
 * removed, so these are accepted and dropped.
 */
export const COMMENT_PSEUDO_TAGS: ReadonlySet<string> = new Set(['comments', '!--']);

const ruleKey = (rule: KeywordRule) => `${rule.tagName}\u0000${rule.keyword}`;

const normalizeTagName = (name: string) => name.trim().toLowerCase();

/**
 * Immutable set of removal rules. Build one with {@link RuleSetBuilder}.
 */
export class RuleSet {
  readonly tagNames: ReadonlySet<string>;
  readonly keywordRules: readonly KeywordRule[];
  readonly keywordScope: KeywordScope;

  private readonly keywordsByTag: ReadonlyMap<string, readonly string[]>;

  constructor(
    tagNames: Iterable<string>,
    keywordRules: Iterable<KeywordRule>,
    options: RuleSetOptions = {}
  ) {
    this.tagNames = new Set(Array.from(tagNames, normalizeTagName));
    this.keywordRules = Object.freeze(
      Array.from(keywordRules, (rule) =>
        Object.freeze({ tagName: normalizeTagName(rule.tagName), keyword: rule.keyword })
      )
    );
    this.keywordScope = options.keywordScope ?? 'text';

    const byTag = new Map<string, string[]>();
    for (const rule of this.keywordRules) {
      const keywords = byTag.get(rule.tagName) ?? [];
      keywords.push(rule.keyword);
      byTag.set(rule.tagName, keywords);
    }
    this.keywordsByTag = byTag;
  }

  static empty(options?: RuleSetOptions): RuleSet {
    return new RuleSet([], [], options);
  }

  get isEmpty(): boolean {
    return this.tagNames.size === 0 && this.keywordRules.length === 0;
  }

  /**
   * True when `node` is an element that any rule removes
   */
  matches(node: DocumentNode): boolean {
    if (!isElement(node)) return false;

    const tagName = node.tagName.toLowerCase();
    if (this.tagNames.has(tagName)) return true;

    const keywords = this.keywordsByTag.get(tagName);
    if (!keywords) return false;

    const haystack = this.searchText(node);
    return keywords.some((keyword) => haystack.includes(keyword));
  }

  private searchText(element: ElementNode): string {
    switch (this.keywordScope) {
      case 'class':
        return getAttribute(element, 'class') ?? '';
      case 'attributes':
        return element.attributes.map((attr) => attr.value).join(' ');
      case 'text':
        return textContent(element);
    }
  }
}

/**
 * Accumulates rules from repeated specifications (e.g. several `-d` and `-k`
 * flags) and freezes them into a {@link RuleSet}.
 */
export class RuleSetBuilder {
  private readonly tagNames = new Set<string>();
  private readonly keywordRules = new Map<string, KeywordRule>();

  /**
   * Add by-name rules. Names are trimmed and lower-cased; blanks are skipped.
   */
  addTagNames(names: Iterable<string>): this {
    for (const raw of names) {
      const name = normalizeTagName(raw);
      if (!name || COMMENT_PSEUDO_TAGS.has(name)) continue;
      this.tagNames.add(name);
    }
    return this;
  }

  /**
   * Add a comma-separated tag list, e.g. `script,link,meta`
   */
  addTagList(list: string): this {
    return this.addTagNames(list.split(','));
  }

  /**
   * Add a tag + keyword rule. An empty keyword matches every element of the
   * tag, the same as a by-name rule.
   */
  addKeywordRule(tagName: string, keyword: string): this {
    const name = normalizeTagName(tagName);
    if (!name) {
      throw new InvalidRuleError(keyword ? `${tagName} ${keyword}` : tagName);
    }
    const rule: KeywordRule = Object.freeze({ tagName: name, keyword });
    this.keywordRules.set(ruleKey(rule), rule);
    return this;
  }

  /**
   * Add a rule written as `"<tag> <keyword>"`. The tag ends at the first
   * whitespace character; the keyword is everything after it.
   */
  addKeywordSpec(spec: string): this {
    const { tagName, keyword } = parseKeywordSpec(spec);
    return this.addKeywordRule(tagName, keyword);
  }

  build(options: RuleSetOptions = {}): RuleSet {
    return new RuleSet(this.tagNames, this.keywordRules.values(), options);
  }
}

export const parseKeywordSpec = (spec: string): KeywordRule => {
  const separator = spec.search(/\s/);
  if (separator < 0) {
    return { tagName: spec, keyword: '' };
  }
  const tagName = spec.slice(0, separator);
  if (!tagName) {
    throw new InvalidRuleError(spec);
  }
  return { tagName, keyword: spec.slice(separator + 1) };
};
