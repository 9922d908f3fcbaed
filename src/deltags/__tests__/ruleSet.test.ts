/**
 * Tests for rule construction and matching
 */

import { describe, it, expect } from 'vitest';
import { RuleSet, RuleSetBuilder, parseKeywordSpec } from '../ruleSet';
import { createComment, createElement, createText } from '../nodes';
import { InvalidRuleError } from '../../errors';

describe('RuleSetBuilder', () => {
  it('should lower-case, trim and dedupe tag names', () => {
    const rules = new RuleSetBuilder().addTagNames(['DIV', ' Nav ', '', 'div']).build();

    expect([...rules.tagNames]).toEqual(['div', 'nav']);
  });

  it('should split comma-separated lists and skip the comment pseudo-tags', () => {
    const rules = new RuleSetBuilder()
      .addTagList('script,,link , comments')
      .addTagList('!--,meta')
      .build();

    expect([...rules.tagNames]).toEqual(['script', 'link', 'meta']);
  });

  it('should merge rules from repeated calls', () => {
    const rules = new RuleSetBuilder()
      .addTagList('script')
      .addTagList('style')
      .addKeywordRule('div', 'ad')
      .addKeywordRule('DIV', 'ad')
      .addKeywordRule('div', 'promo')
      .build();

    expect([...rules.tagNames]).toEqual(['script', 'style']);
    expect(rules.keywordRules).toEqual([
      { tagName: 'div', keyword: 'ad' },
      { tagName: 'div', keyword: 'promo' },
    ]);
  });

  it('should reject a keyword rule without a tag name', () => {
    const builder = new RuleSetBuilder();

    expect(() => builder.addKeywordRule('', 'x')).toThrow(InvalidRuleError);
    expect(() => builder.addKeywordRule('   ', 'x')).toThrow("invalid keyword rule '    x': tag name is empty");
  });

  it('should accept an empty keyword', () => {
    const rules = new RuleSetBuilder().addKeywordRule('span', '').build();

    expect(rules.keywordRules).toEqual([{ tagName: 'span', keyword: '' }]);
  });

  it('should not change a built set when more rules are added', () => {
    const builder = new RuleSetBuilder().addTagList('nav');
    const first = builder.build();
    builder.addTagList('footer').addKeywordRule('div', 'x');

    expect([...first.tagNames]).toEqual(['nav']);
    expect(first.keywordRules).toHaveLength(0);
    expect([...builder.build().tagNames]).toEqual(['nav', 'footer']);
  });
});

describe('parseKeywordSpec', () => {
  it('should split at the first whitespace character', () => {
    expect(parseKeywordSpec('div some text')).toEqual({ tagName: 'div', keyword: 'some text' });
    expect(parseKeywordSpec('div\tfoo')).toEqual({ tagName: 'div', keyword: 'foo' });
  });

  it('should keep whitespace after the separator as part of the keyword', () => {
    expect(parseKeywordSpec('div  padded')).toEqual({ tagName: 'div', keyword: ' padded' });
  });

  it('should treat a bare tag as an empty keyword', () => {
    expect(parseKeywordSpec('aside')).toEqual({ tagName: 'aside', keyword: '' });
  });

  it('should reject a spec that starts with whitespace', () => {
    expect(() => parseKeywordSpec(' foo')).toThrow(InvalidRuleError);
  });

  it('should reject an empty spec when added to a builder', () => {
    expect(() => new RuleSetBuilder().addKeywordSpec('')).toThrow(InvalidRuleError);
  });
});

describe('RuleSet.matches', () => {
  it('should never match non-element nodes', () => {
    const rules = new RuleSetBuilder().addTagList('p').addKeywordRule('p', '').build();

    expect(rules.matches(createText('p'))).toBe(false);
    expect(rules.matches(createComment('p'))).toBe(false);
  });

  it('should normalize tag names passed to the constructor', () => {
    const rules = new RuleSet([' DIV '], [{ tagName: 'P', keyword: 'ad' }]);

    expect([...rules.tagNames]).toEqual(['div']);
    expect(rules.keywordRules).toEqual([{ tagName: 'p', keyword: 'ad' }]);
    expect(rules.matches(createElement('div'))).toBe(true);
    expect(rules.matches(createElement('p', {}, [createText('an ad')]))).toBe(true);
  });

  it('should match tag names case-insensitively', () => {
    const rules = new RuleSetBuilder().addTagList('div').build();

    expect(rules.matches(createElement('DIV'))).toBe(true);
    expect(rules.matches(createElement('span'))).toBe(false);
  });

  it('should match keywords as case-sensitive substrings of the text', () => {
    const element = createElement('div', {}, [
      createText('This is '),
      createElement('b', {}, [createText('Secret')]),
      createText(' stuff'),
    ]);

    const match = (keyword: string) =>
      new RuleSetBuilder().addKeywordRule('div', keyword).build().matches(element);

    expect(match('Secret')).toBe(true);
    expect(match('is Secret st')).toBe(true);
    expect(match('secret')).toBe(false);
    expect(match('Secrets')).toBe(false);
  });

  it('should only apply a keyword rule to its own tag', () => {
    const rules = new RuleSetBuilder().addKeywordRule('div', 'ad').build();

    expect(rules.matches(createElement('span', {}, [createText('ad')]))).toBe(false);
  });

  it('should ignore attribute values in the default text scope', () => {
    const rules = new RuleSetBuilder().addKeywordRule('div', 'banner').build();
    const element = createElement('div', { class: 'ad-banner' }, [createText('hello')]);

    expect(rules.keywordScope).toBe('text');
    expect(rules.matches(element)).toBe(false);
  });

  it('should search the class attribute in class scope', () => {
    const rules = new RuleSetBuilder()
      .addKeywordRule('div', 'banner')
      .build({ keywordScope: 'class' });

    expect(rules.matches(createElement('div', { class: 'ad-banner' }, [createText('hi')]))).toBe(true);
    expect(rules.matches(createElement('div', { id: 'banner' }))).toBe(false);
    expect(rules.matches(createElement('div', {}, [createText('banner')]))).toBe(false);
  });

  it('should search every attribute value in attributes scope', () => {
    const rules = new RuleSetBuilder()
      .addKeywordRule('div', 'promo')
      .build({ keywordScope: 'attributes' });

    expect(rules.matches(createElement('div', { id: 'promo-1' }))).toBe(true);
    expect(rules.matches(createElement('div', { 'data-kind': 'promo' }))).toBe(true);
    expect(rules.matches(createElement('div', {}, [createText('promo')]))).toBe(false);
  });

  it('should report an empty rule set', () => {
    expect(RuleSet.empty().isEmpty).toBe(true);
    expect(new RuleSetBuilder().addTagList('a').build().isEmpty).toBe(false);
  });
});
