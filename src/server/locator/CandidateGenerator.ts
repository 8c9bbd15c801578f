// ============================================================================
// CANDIDATE GENERATOR
// ============================================================================
// Builds every applicable XPath strategy for one element. Strategies are
// evaluated independently; positional is always produced so that no element
// ends up without a candidate.

import { isHtmlElement } from '../dom/HtmlDocument.js';
import type { ElementNode } from '../dom/HtmlDocument.js';
import { LocatorStrategy } from '../types/locator-types.js';
import type { Candidate, CandidateDraft } from '../types/locator-types.js';
import { withConfidence } from './ConfidenceScorer.js';
import { literalValues, normalizeSpace, stripLiterals, xpathLiteral } from './xpathLiteral.js';

/** Names usable in a bare name test or `@name` step */
const XPATH_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Node test for an element. Elements outside the HTML namespace (inline SVG,
 * MathML) are not matched by a bare name test in an HTML document, and some
 * tag names the HTML parser accepts (`o:p`, `x!y`) are not XPath names, so
 * both are matched on their local name. The explicit `.` argument is
 * required: jsdom only implements the one-argument form of local-name().
 */
export function tagTest(element: ElementNode): string {
  if (isHtmlElement(element) && XPATH_NAME.test(element.tag)) {
    return element.tag;
  }
  return `*[local-name(.)=${xpathLiteral(element.tag)}]`;
}

export function countPredicates(expression: string): number {
  const stripped = stripLiterals(expression);
  const brackets = stripped.match(/\[/g)?.length ?? 0;
  const connectives = stripped.match(/\s(and|or)\s/g)?.length ?? 0;
  return brackets + connectives;
}

export function generateCandidates(element: ElementNode): Candidate[] {
  const drafts = [
    attributeDraft(element, 'id', LocatorStrategy.ID),
    attributeDraft(element, 'name', LocatorStrategy.NAME),
    attributeDraft(element, 'class', LocatorStrategy.CLASS),
    textDraft(element),
    combinedDraft(element),
    positionalDraft(element),
  ];

  return drafts.filter((draft): draft is CandidateDraft => draft !== null).map(withConfidence);
}

function draft(element: ElementNode, strategy: LocatorStrategy, expression: string, keyValue: string): CandidateDraft {
  return {
    expression,
    strategy,
    keyValue,
    predicateCount: countPredicates(expression),
    source: element,
    origin: 'rule',
  };
}

function attributeDraft(element: ElementNode, attribute: string, strategy: LocatorStrategy): CandidateDraft | null {
  const value = element.attributes.get(attribute);
  if (value === undefined || value.trim().length === 0) return null;

  return draft(element, strategy, `//${tagTest(element)}[@${attribute}=${xpathLiteral(value)}]`, value);
}

function textDraft(element: ElementNode): CandidateDraft | null {
  if (element.text.length === 0) return null;

  const raw = element.textNodes.find((data) => data.trim().length > 0);
  if (raw === undefined) return null;

  // text() compares the raw node data, so padded text needs normalize-space
  const normalized = normalizeSpace(raw);
  if (raw === normalized) {
    return draft(element, LocatorStrategy.TEXT, `//${tagTest(element)}[text()=${xpathLiteral(raw)}]`, raw);
  }

  return draft(
    element,
    LocatorStrategy.TEXT,
    `//${tagTest(element)}[text()[normalize-space()=${xpathLiteral(normalized)}]]`,
    normalized
  );
}

/**
 * Two-attribute locator. Pair preference: name+type, class+type, then the
 * first two usable attributes in source order.
 */
function combinedDraft(element: ElementNode): CandidateDraft | null {
  const usable = new Map<string, string>();
  for (const [name, value] of element.attributes) {
    if (name !== 'id' && value.trim().length > 0 && XPATH_NAME.test(name)) {
      usable.set(name, value);
    }
  }
  if (usable.size < 2) return null;

  let pair: [string, string];
  if (usable.has('name') && usable.has('type')) {
    pair = ['name', 'type'];
  } else if (usable.has('class') && usable.has('type')) {
    pair = ['class', 'type'];
  } else {
    const [first, second] = usable.keys();
    pair = [first, second];
  }

  const [firstName, secondName] = pair;
  const firstValue = usable.get(firstName) ?? '';
  const secondValue = usable.get(secondName) ?? '';
  const expression =
    `//${tagTest(element)}` +
    `[@${firstName}=${xpathLiteral(firstValue)} and @${secondName}=${xpathLiteral(secondValue)}]`;

  return draft(element, LocatorStrategy.COMBINED, expression, `${firstValue} ${secondValue}`);
}

function positionalDraft(element: ElementNode): CandidateDraft {
  if (element.parent) {
    const position = element.siblingPosition;
    return draft(element, LocatorStrategy.POSITIONAL, `//${tagTest(element)}[${position}]`, String(position));
  }

  const position = element.documentPosition;
  return draft(element, LocatorStrategy.POSITIONAL, `(//${tagTest(element)})[${position}]`, String(position));
}

// ----------------------------------------------------------------------------
// External expressions
// ----------------------------------------------------------------------------

export interface ExpressionClass {
  strategy: LocatorStrategy;
  keyValue: string;
  predicateCount: number;
}

/** A string literal or a concat() of literals, after stripLiterals */
const LITERAL = String.raw`(?:''|""|concat\(\s*(?:''|"")(?:\s*,\s*(?:''|""))*\s*\))`;
const ATTRIBUTE_TEST = String.raw`@[A-Za-z_][A-Za-z0-9_.-]*\s*=\s*${LITERAL}`;

const LOCAL_NAME_PREDICATE = new RegExp(String.raw`^local-name\(\.\)\s*=\s*${LITERAL}$`);
const KEYED_PREDICATE = new RegExp(String.raw`^@(id|name|class)\s*=\s*${LITERAL}$`);
const COMBINED_PREDICATE = new RegExp(String.raw`^${ATTRIBUTE_TEST}(?:\s+and\s+${ATTRIBUTE_TEST})+$`);
const TEXT_PREDICATE = new RegExp(
  String.raw`^(?:text\(\)\s*=\s*${LITERAL}` +
    String.raw`|text\(\)\[normalize-space\(\)\s*=\s*${LITERAL}\]` +
    String.raw`|normalize-space\((?:text\(\)|\.)?\)\s*=\s*${LITERAL}` +
    String.raw`|contains\((?:text\(\)|\.)\s*,\s*${LITERAL}\))$`
);

const KEYED_STRATEGIES: Readonly<Record<string, LocatorStrategy>> = {
  id: LocatorStrategy.ID,
  name: LocatorStrategy.NAME,
  class: LocatorStrategy.CLASS,
};

/**
 * Predicates of a single `//nodetest[...]...` step, or null when the
 * expression has further steps, a union, or a parenthesised head
 */
function singleStepPredicates(stripped: string): string[] | null {
  const head = /^\/\/(?:[A-Za-z_][A-Za-z0-9_.-]*|\*)/.exec(stripped.trim());
  if (!head) return null;

  const rest = stripped.trim().slice(head[0].length);
  const predicates: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i];
    if (ch === '[') {
      if (depth === 0) start = i + 1;
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth < 0) return null;
      if (depth === 0) predicates.push(rest.slice(start, i).trim());
    } else if (depth === 0) {
      return null;
    }
  }
  return depth === 0 ? predicates : null;
}

/**
 * Infer the strategy of an expression written elsewhere, so it can be scored
 * like a generated one. Only a single step keyed on one predicate earns an
 * attribute or text strategy; paths through other elements, extra
 * predicates and anything unrecognised are treated as positional.
 */
export function classifyExpression(expression: string): ExpressionClass {
  const stripped = stripLiterals(expression);
  const predicateCount = countPredicates(expression);
  const literals = literalValues(expression);

  const predicates = singleStepPredicates(stripped);
  if (predicates && predicates.length > 0 && LOCAL_NAME_PREDICATE.test(predicates[0])) {
    // the node test's own literals come first
    const nameLiterals = predicates[0].match(/''|""/g)?.length ?? 0;
    predicates.shift();
    literals.splice(0, nameLiterals);
  }

  if (predicates && predicates.length === 1) {
    const [predicate] = predicates;
    const keyed = KEYED_PREDICATE.exec(predicate);
    if (keyed) {
      return { strategy: KEYED_STRATEGIES[keyed[1]], keyValue: literals.join(''), predicateCount };
    }
    if (COMBINED_PREDICATE.test(predicate)) {
      return { strategy: LocatorStrategy.COMBINED, keyValue: literals.join(' '), predicateCount };
    }
    if (TEXT_PREDICATE.test(predicate)) {
      return { strategy: LocatorStrategy.TEXT, keyValue: literals.join(''), predicateCount };
    }
  }

  const positions = Array.from(stripped.matchAll(/\[(\d+)\]/g), (m) => m[1]);
  return { strategy: LocatorStrategy.POSITIONAL, keyValue: positions.at(-1) ?? '0', predicateCount };
}
