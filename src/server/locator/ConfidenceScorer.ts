// ============================================================================
// CONFIDENCE SCORER
// ============================================================================
// Each strategy owns a fixed confidence band. Where a candidate lands inside
// its band depends on how distinctive the value it keys on is.

import { LocatorStrategy, STRATEGY_PRIORITY } from '../types/locator-types.js';
import type { Candidate, CandidateDraft } from '../types/locator-types.js';

export interface ConfidenceBand {
  min: number;
  max: number;
}

export const CONFIDENCE_BANDS: Readonly<Record<LocatorStrategy, ConfidenceBand>> = {
  [LocatorStrategy.ID]: { min: 0.9, max: 1.0 },
  [LocatorStrategy.NAME]: { min: 0.7, max: 0.9 },
  [LocatorStrategy.CLASS]: { min: 0.5, max: 0.7 },
  [LocatorStrategy.TEXT]: { min: 0.3, max: 0.5 },
  [LocatorStrategy.COMBINED]: { min: 0.6, max: 0.8 },
  [LocatorStrategy.POSITIONAL]: { min: 0.0, max: 0.3 },
};

/**
 * Tokens common enough in markup that they say little about which element is meant
 */
const GENERIC_TOKENS = new Set([
  'btn',
  'button',
  'item',
  'items',
  'row',
  'col',
  'column',
  'container',
  'wrapper',
  'wrap',
  'content',
  'inner',
  'outer',
  'box',
  'block',
  'element',
  'div',
  'span',
  'link',
  'text',
  'field',
  'input',
  'main',
  'section',
]);

/** Values at least this long get the full length contribution */
const FULL_LENGTH = 24;

/** Digit runs typical of generated ids ("ember1234", "field_20931") */
const GENERATED_PATTERN = /\d{3,}/;

export function tokenize(value: string): string[] {
  return value.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

export function hasGenericToken(value: string): boolean {
  return tokenize(value).some((token) => GENERIC_TOKENS.has(token));
}

/**
 * 0..1 measure of how specific a candidate's key value is
 */
export function distinctiveness(draft: Pick<CandidateDraft, 'strategy' | 'keyValue'>): number {
  if (draft.strategy === LocatorStrategy.POSITIONAL) {
    const position = Number.parseInt(draft.keyValue, 10);
    return Number.isFinite(position) && position > 0 ? 0.5 / position : 0;
  }

  const value = draft.keyValue.trim();
  if (value.length === 0) return 0;

  const lengthFactor = Math.min(value.length, FULL_LENGTH) / FULL_LENGTH;
  const specific = tokenize(value).length > 0 && !hasGenericToken(value);
  const stable = !GENERATED_PATTERN.test(value);

  return clamp(lengthFactor * 0.5 + (specific ? 0.3 : 0) + (stable ? 0.2 : 0), 0, 1);
}

export function scoreCandidate(draft: Pick<CandidateDraft, 'strategy' | 'keyValue'>): number {
  const band = CONFIDENCE_BANDS[draft.strategy];
  const score = band.min + (band.max - band.min) * distinctiveness(draft);
  return Math.round(clamp(score, band.min, band.max) * 1000) / 1000;
}

export function withConfidence(draft: CandidateDraft): Candidate {
  return { ...draft, confidence: scoreCandidate(draft) };
}

/**
 * Ranking order: higher confidence, then fewer predicates, then shorter
 * expression, then strategy priority, then document order of the source
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.confidence - a.confidence ||
    a.predicateCount - b.predicateCount ||
    a.expression.length - b.expression.length ||
    STRATEGY_PRIORITY.indexOf(a.strategy) - STRATEGY_PRIORITY.indexOf(b.strategy) ||
    a.source.index - b.source.index ||
    (a.expression < b.expression ? -1 : a.expression > b.expression ? 1 : 0)
  );
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
