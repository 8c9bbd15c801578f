// ============================================================================
// UNIQUENESS VERIFIER
// ============================================================================

import type { ElementNode, HtmlDocument } from '../dom/HtmlDocument.js';
import type { Candidate, UniquenessVerdict } from '../types/locator-types.js';

export interface Verification {
  verdict: UniquenessVerdict;
  matchCount: number;
  matches: ElementNode[];
}

/**
 * Verdict for a set of matches relative to the element(s) the locator is
 * meant for. A locator that does not select an intended element is a miss
 * no matter how many other nodes it selects.
 */
export function verdictFor(
  matchCount: number,
  matches: readonly ElementNode[],
  isIntended: (element: ElementNode) => boolean
): UniquenessVerdict {
  if (!matches.some(isIntended)) {
    return { kind: 'no-match', matchCount };
  }
  if (matchCount === 1) {
    return { kind: 'unique' };
  }
  return { kind: 'ambiguous', matchCount };
}

/**
 * Evaluate an arbitrary expression against the document.
 * Throws InvalidExpressionError for malformed expressions.
 */
export function verifyExpression(
  document: HtmlDocument,
  expression: string,
  isIntended: (element: ElementNode) => boolean = () => true
): Verification {
  const { count, elements } = document.evaluate(expression);
  return { verdict: verdictFor(count, elements, isIntended), matchCount: count, matches: elements };
}

export function verify(candidate: Candidate, document: HtmlDocument): UniquenessVerdict {
  return verifyExpression(document, candidate.expression, (element) => element === candidate.source).verdict;
}

export function isUnique(verdict: UniquenessVerdict): boolean {
  return verdict.kind === 'unique';
}
