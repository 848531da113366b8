import type { SectionType } from '../types/index.js';

export interface TaxonomyEntry {
  selector: string;
  semanticType: SectionType;
}

// Evaluated in this order; earlier entries win ties after the score sort.
export const STRUCTURAL_SELECTORS: readonly TaxonomyEntry[] = [
  { selector: 'article', semanticType: 'article' },
  { selector: 'main', semanticType: 'main_content' },
  { selector: "[role='main']", semanticType: 'main_content' },
  { selector: '.content', semanticType: 'main_content' },
  { selector: '.main-content', semanticType: 'main_content' },
  { selector: '.post-content', semanticType: 'article' },
  { selector: '.article-body', semanticType: 'article' },
  { selector: 'aside', semanticType: 'sidebar' },
  { selector: '.sidebar', semanticType: 'sidebar' },
  { selector: '.widget', semanticType: 'sidebar' },
  { selector: 'nav', semanticType: 'navigation' },
  { selector: '.navigation', semanticType: 'navigation' },
  { selector: '.menu', semanticType: 'navigation' },
  { selector: 'header', semanticType: 'header' },
  { selector: 'footer', semanticType: 'footer' },
  { selector: '.comments', semanticType: 'comments' },
  { selector: '#comments', semanticType: 'comments' },
  { selector: '.comment-list', semanticType: 'comments' },
];

export const FALLBACK_CONTAINER_SELECTOR = 'div';

export function isContentType(type: SectionType): boolean {
  return type === 'article' || type === 'main_content';
}

/** Page chrome is kept whatever its text length. */
export function isStructuralChrome(type: SectionType): boolean {
  return type === 'header' || type === 'footer' || type === 'navigation';
}
