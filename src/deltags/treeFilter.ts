import { coreLogger } from '../logger';
import { createDocument } from './nodes';
import type { RuleSet } from './ruleSet';
import type {
  ChildNode,
  DocumentRoot,
  ElementNode,
  FilterResult,
  FilterStats,
} from './types';

/* ------------------------------------------------------------------ */
/*  Filtering                                                          */
/* ------------------------------------------------------------------ */

/**
 * Copy `children`, dropping comments and every element the rules match.
 * A matched element is dropped whole: its subtree is never visited, so rules
 * are always evaluated against the input tree as the parser produced it.
 */
const filterChildren = (
  children: readonly ChildNode[],
  rules: RuleSet,
  stats: FilterStats
): ChildNode[] => {
  const kept: ChildNode[] = [];

  for (const child of children) {
    switch (child.kind) {
      case 'comment':
        stats.removedComments += 1;
        break;
      case 'element':
        if (rules.matches(child)) {
          const tag = child.tagName.toLowerCase();
          stats.removedElements[tag] = (stats.removedElements[tag] ?? 0) + 1;
        } else {
          kept.push(copyElement(child, rules, stats));
        }
        break;
      case 'text':
        kept.push({ kind: 'text', value: child.value });
        break;
      case 'doctype':
        kept.push({ ...child });
        break;
    }
  }

  return kept;
};

const copyElement = (element: ElementNode, rules: RuleSet, stats: FilterStats): ElementNode => ({
  kind: 'element',
  tagName: element.tagName,
  namespace: element.namespace,
  attributes: element.attributes.map((attr) => ({ name: attr.name, value: attr.value })),
  children: filterChildren(element.children, rules, stats),
});

/**
 * Remove every comment and every element matched by `rules` (with its whole
 * subtree) from `document`. The input tree is left untouched; the returned
 * tree shares no nodes with it.
 */
export const filterTreeWithStats = (document: DocumentRoot, rules: RuleSet): FilterResult => {
  const stats: FilterStats = { removedElements: {}, removedComments: 0 };
  const filtered = createDocument(filterChildren(document.children, rules, stats));

  coreLogger.debug('Filtered document', {
    removedElements: stats.removedElements,
    removedComments: stats.removedComments,
  });

  return { document: filtered, stats };
};

export const filterTree = (document: DocumentRoot, rules: RuleSet): DocumentRoot =>
  filterTreeWithStats(document, rules).document;
