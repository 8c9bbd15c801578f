// ============================================================================
// LOCATOR TYPES
// ============================================================================

import type { ElementNode } from '../dom/HtmlDocument.js';

/**
 * Locator strategies, in priority order
 */
export enum LocatorStrategy {
  ID = 'id',
  NAME = 'name',
  CLASS = 'class',
  TEXT = 'text',
  COMBINED = 'combined',
  POSITIONAL = 'positional',
}

export const STRATEGY_PRIORITY: readonly LocatorStrategy[] = [
  LocatorStrategy.ID,
  LocatorStrategy.NAME,
  LocatorStrategy.CLASS,
  LocatorStrategy.TEXT,
  LocatorStrategy.COMBINED,
  LocatorStrategy.POSITIONAL,
];

/** Where a candidate came from */
export type CandidateOrigin = 'rule' | 'external';

/**
 * A locator before scoring
 */
export interface CandidateDraft {
  expression: string;
  strategy: LocatorStrategy;
  /**
   * Value the strategy keys on (attribute value, text, joined attribute
   * values, or the position number for positional locators)
   */
  keyValue: string;
  predicateCount: number;
  source: ElementNode;
  origin: CandidateOrigin;
}

export interface Candidate extends CandidateDraft {
  /** 0..1 */
  confidence: number;
}

export type UniquenessVerdict =
  | { kind: 'unique' }
  | { kind: 'ambiguous'; matchCount: number }
  | { kind: 'no-match'; matchCount: number };

export interface ElementRef {
  tag: string;
  /** Document-order index */
  index: number;
}

/**
 * Plain-data view of a verified candidate, safe to serialize
 */
export interface CandidateReport {
  expression: string;
  strategy: LocatorStrategy;
  confidence: number;
  verdict: UniquenessVerdict;
  matchCount: number;
  origin: CandidateOrigin;
  /** Element the locator was derived from, null for an external locator that misses every target */
  element: ElementRef | null;
  /** Set when the expression could not be evaluated */
  error?: string;
}

export enum FailureReason {
  TARGET_NOT_FOUND = 'TargetNotFound',
  NO_UNIQUE_LOCATOR = 'NoUniqueLocator',
}

export interface ResolutionSuccess {
  status: 'success';
  candidate: CandidateReport;
  confidence: number;
  strategy: LocatorStrategy;
  /** Every other candidate, descending confidence; non-unique ones keep their verdict */
  alternateCandidates: CandidateReport[];
}

export interface ResolutionFailure {
  status: 'failure';
  reason: FailureReason;
  message: string;
  attemptedStrategies: CandidateReport[];
}

export type ResolutionResult = ResolutionSuccess | ResolutionFailure;

/**
 * Locator proposed by a source outside the rule-based generator
 */
export interface ExternalCandidate {
  expression: string;
  reasoning?: string;
}

export interface ResolveOptions {
  elementTypeHint?: string;
  externalCandidates?: readonly ExternalCandidate[];
}
