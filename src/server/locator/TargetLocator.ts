// ============================================================================
// TARGET LOCATOR
// ============================================================================
// Finds the element(s) a natural-language description refers to by matching
// it against direct text, attribute values and element-type keywords.

import { byAttribute, byTag } from '../dom/HtmlDocument.js';
import type { ElementNode, ElementPredicate, HtmlDocument } from '../dom/HtmlDocument.js';

/**
 * Elements that never make sense as a locator target
 */
const NON_TARGET_TAGS = new Set([
  'html',
  'head',
  'body',
  'script',
  'style',
  'meta',
  'link',
  'title',
  'base',
  'noscript',
  'template',
]);

const STOP_WORDS = new Set([
  'a',
  'an',
  'the',
  'to',
  'of',
  'on',
  'in',
  'for',
  'with',
  'this',
  'that',
  'element',
  'named',
  'called',
  'labeled',
  'labelled',
]);

const inputOfType =
  (...types: string[]): ElementPredicate =>
  (element) =>
    element.tag === 'input' && types.includes((element.attributes.get('type') ?? 'text').toLowerCase());

const anyOf =
  (...predicates: ElementPredicate[]): ElementPredicate =>
  (element) =>
    predicates.some((predicate) => predicate(element));

const buttonHint = anyOf(byTag('button'), inputOfType('submit', 'button', 'reset', 'image'), byAttribute('role', 'button'));
const linkHint = anyOf(byTag('a'), byAttribute('role', 'link'));
const textInputHint = anyOf(
  inputOfType('text', 'email', 'password', 'search', 'tel', 'url', 'number', 'date'),
  byTag('textarea'),
  byAttribute('role', 'textbox')
);
const selectHint = anyOf(byTag('select'), byAttribute('role', 'combobox'), byAttribute('role', 'listbox'));
const imageHint = byTag('img', 'svg', 'picture');
const headingHint = anyOf(byTag('h1', 'h2', 'h3', 'h4', 'h5', 'h6'), byAttribute('role', 'heading'));

/**
 * Element-type keywords, as they appear in descriptions or type hints
 */
const TYPE_HINTS: ReadonlyMap<string, ElementPredicate> = new Map([
  ['button', buttonHint],
  ['btn', buttonHint],
  ['link', linkHint],
  ['anchor', linkHint],
  ['hyperlink', linkHint],
  ['input', textInputHint],
  ['field', textInputHint],
  ['textbox', textInputHint],
  ['textarea', byTag('textarea')],
  ['checkbox', inputOfType('checkbox')],
  ['radio', inputOfType('radio')],
  ['dropdown', selectHint],
  ['select', selectHint],
  ['combobox', selectHint],
  ['image', imageHint],
  ['img', imageHint],
  ['icon', imageHint],
  ['heading', headingHint],
  ['form', byTag('form')],
  ['label', byTag('label')],
  ['table', byTag('table')],
  ['list', byTag('ul', 'ol')],
]);

export interface TargetQuery {
  /** Description words left after removing type keywords and stop words */
  tokens: string[];
  /** The same words joined by single spaces */
  phrase: string;
  hints: ElementPredicate[];
}

export function tokenizeDescription(description: string): string[] {
  return description.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

export function parseDescription(description: string, elementTypeHint?: string): TargetQuery {
  const hints: ElementPredicate[] = [];
  const tokens: string[] = [];

  for (const word of tokenizeDescription(description)) {
    const hint = TYPE_HINTS.get(word);
    if (hint) {
      hints.push(hint);
    } else if (!STOP_WORDS.has(word)) {
      tokens.push(word);
    }
  }

  const explicit = elementTypeHint?.trim().toLowerCase();
  if (explicit) {
    hints.push(TYPE_HINTS.get(explicit) ?? byTag(explicit));
  }

  return { tokens, phrase: tokens.join(' '), hints };
}

export function isCandidateTarget(element: ElementNode): boolean {
  if (NON_TARGET_TAGS.has(element.tag)) return false;

  for (let ancestor = element.parent; ancestor; ancestor = ancestor.parent) {
    if (ancestor.tag === 'head') return false;
  }
  return true;
}

/**
 * Case-insensitive match of the query words against direct text and
 * attribute values: the whole phrase as a substring of one value, or
 * failing that every word somewhere on the element
 */
export function matchesText(element: ElementNode, query: TargetQuery): boolean {
  if (query.tokens.length === 0) return false;

  const values = [element.text, ...element.attributes.values()].map((value) => value.toLowerCase());
  if (values.some((value) => value.includes(query.phrase))) {
    return true;
  }

  const haystack = values.join(' ');
  return query.tokens.every((token) => haystack.includes(token));
}

function matchesHints(element: ElementNode, query: TargetQuery): boolean {
  return query.hints.some((hint) => hint(element));
}

/**
 * Elements the description refers to, in document order. When a type hint
 * is present and some matches satisfy it, only those are kept.
 */
export function locateTargets(document: HtmlDocument, description: string, elementTypeHint?: string): ElementNode[] {
  const query = parseDescription(description, elementTypeHint);
  const eligible = document.findElements(isCandidateTarget);

  if (query.tokens.length === 0) {
    return query.hints.length > 0 ? eligible.filter((element) => matchesHints(element, query)) : [];
  }

  const matched = eligible.filter((element) => matchesText(element, query));
  if (query.hints.length === 0) {
    return matched;
  }

  const hinted = matched.filter((element) => matchesHints(element, query));
  return hinted.length > 0 ? hinted : matched;
}
