// ============================================================================
// RESOLUTION ENGINE
// ============================================================================
// Start → LocateTarget → GenerateCandidates → FilterUnique → SelectBest →
// Succeeded | Failed. One engine instance per request; it only reads the
// document, so a parsed document can be shared between engines.

import type { ElementNode, HtmlDocument } from '../dom/HtmlDocument.js';
import { InvalidExpressionError } from '../types/errors.js';
import { FailureReason } from '../types/locator-types.js';
import type {
  Candidate,
  CandidateReport,
  ExternalCandidate,
  ResolutionResult,
  ResolveOptions,
  UniquenessVerdict,
} from '../types/locator-types.js';
import { classifyExpression, generateCandidates } from './CandidateGenerator.js';
import { compareCandidates, scoreCandidate, withConfidence } from './ConfidenceScorer.js';
import { locateTargets } from './TargetLocator.js';
import { isUnique, verifyExpression } from './UniquenessVerifier.js';
import type { Verification } from './UniquenessVerifier.js';

export enum ResolutionState {
  START = 'Start',
  LOCATE_TARGET = 'LocateTarget',
  GENERATE_CANDIDATES = 'GenerateCandidates',
  FILTER_UNIQUE = 'FilterUnique',
  SELECT_BEST = 'SelectBest',
  SUCCEEDED = 'Succeeded',
  FAILED = 'Failed',
}

export type ResolutionRequest =
  | { kind: 'description'; description: string; options?: ResolveOptions }
  | { kind: 'element'; element: ElementNode };

interface VerifiedCandidate {
  candidate: Candidate;
  verdict: UniquenessVerdict;
  matchCount: number;
  error?: string;
}

type Evaluation = Verification | { error: InvalidExpressionError };

export class ResolutionEngine {
  private state = ResolutionState.START;
  private readonly visited: ResolutionState[] = [];
  private targets: ElementNode[] = [];
  private candidates: Candidate[] = [];
  private verified: VerifiedCandidate[] = [];
  /** External locators that select none of the targets */
  private offTarget: CandidateReport[] = [];
  private outcome: ResolutionResult | null = null;

  constructor(
    private readonly document: HtmlDocument,
    private readonly request: ResolutionRequest
  ) {}

  /** States entered so far, in order */
  get transitions(): readonly ResolutionState[] {
    return this.visited;
  }

  run(): ResolutionResult {
    for (;;) {
      this.visited.push(this.state);

      switch (this.state) {
        case ResolutionState.START:
          this.state = ResolutionState.LOCATE_TARGET;
          break;
        case ResolutionState.LOCATE_TARGET:
          this.locateTarget();
          break;
        case ResolutionState.GENERATE_CANDIDATES:
          this.generate();
          break;
        case ResolutionState.FILTER_UNIQUE:
          this.filterUnique();
          break;
        case ResolutionState.SELECT_BEST:
          this.selectBest();
          break;
        case ResolutionState.SUCCEEDED:
        case ResolutionState.FAILED:
          if (!this.outcome) {
            throw new Error(`Resolution reached ${this.state} without an outcome`);
          }
          return this.outcome;
      }
    }
  }

  private locateTarget(): void {
    this.targets =
      this.request.kind === 'element'
        ? [this.request.element]
        : locateTargets(this.document, this.request.description, this.request.options?.elementTypeHint);

    if (this.targets.length === 0) {
      const description = this.request.kind === 'description' ? this.request.description : '';
      this.fail(FailureReason.TARGET_NOT_FOUND, `No element matches "${description}"`, []);
      return;
    }
    this.state = ResolutionState.GENERATE_CANDIDATES;
  }

  private generate(): void {
    const seen = new Set<string>();
    const add = (candidate: Candidate): void => {
      if (seen.has(candidate.expression)) return;
      seen.add(candidate.expression);
      this.candidates.push(candidate);
    };

    for (const target of this.targets) {
      generateCandidates(target).forEach(add);
    }

    const external = this.request.kind === 'description' ? this.request.options?.externalCandidates ?? [] : [];
    for (const suggestion of external) {
      const candidate = this.adoptExternal(suggestion);
      if (candidate) add(candidate);
    }

    this.state = ResolutionState.FILTER_UNIQUE;
  }

  /**
   * Turn an external locator into a candidate sourced from the target it
   * selects. Scoring ignores whatever confidence the source claimed.
   */
  private adoptExternal(suggestion: ExternalCandidate): Candidate | null {
    const { expression } = suggestion;
    const classified = classifyExpression(expression);
    const evaluation = this.evaluate(expression);
    const report: CandidateReport = {
      expression,
      strategy: classified.strategy,
      confidence: scoreCandidate(classified),
      verdict: { kind: 'no-match', matchCount: 0 },
      matchCount: 0,
      origin: 'external',
      element: null,
    };

    if ('error' in evaluation) {
      this.offTarget.push({ ...report, error: evaluation.error.message });
      return null;
    }

    const { matchCount, matches } = evaluation;
    const source = matches.find((element) => this.targets.includes(element));
    if (!source) {
      this.offTarget.push({
        ...report,
        verdict: { kind: 'no-match', matchCount },
        matchCount,
        element: matches.length > 0 ? { tag: matches[0].tag, index: matches[0].index } : null,
      });
      return null;
    }

    return withConfidence({ expression, ...classified, source, origin: 'external' });
  }

  private filterUnique(): void {
    this.verified = this.candidates.map((candidate): VerifiedCandidate => {
      const evaluation = this.evaluate(candidate.expression, (element) => element === candidate.source);
      if ('error' in evaluation) {
        return {
          candidate,
          verdict: { kind: 'no-match', matchCount: 0 },
          matchCount: 0,
          error: evaluation.error.message,
        };
      }
      return { candidate, verdict: evaluation.verdict, matchCount: evaluation.matchCount };
    });
    this.state = ResolutionState.SELECT_BEST;
  }

  /**
   * Malformed expressions become a recorded defect of that candidate
   * instead of aborting the resolution
   */
  private evaluate(expression: string, isIntended?: (element: ElementNode) => boolean): Evaluation {
    try {
      return verifyExpression(this.document, expression, isIntended);
    } catch (error) {
      if (error instanceof InvalidExpressionError) return { error };
      throw error;
    }
  }

  private selectBest(): void {
    const ranked = [...this.verified].sort((a, b) => compareCandidates(a.candidate, b.candidate));
    const winner = ranked.find((entry) => isUnique(entry.verdict));

    if (!winner) {
      this.fail(
        FailureReason.NO_UNIQUE_LOCATOR,
        `None of ${ranked.length} candidate locators for ${this.targets.length} target element(s) is unique`,
        byConfidence([...ranked.map(toReport), ...this.offTarget])
      );
      return;
    }

    const report = toReport(winner);
    this.outcome = {
      status: 'success',
      candidate: report,
      confidence: report.confidence,
      strategy: report.strategy,
      alternateCandidates: byConfidence([
        ...ranked.filter((entry) => entry !== winner).map(toReport),
        ...this.offTarget,
      ]),
    };
    this.state = ResolutionState.SUCCEEDED;
  }

  private fail(reason: FailureReason, message: string, attemptedStrategies: CandidateReport[]): void {
    this.outcome = { status: 'failure', reason, message, attemptedStrategies };
    this.state = ResolutionState.FAILED;
  }
}

function toReport({ candidate, verdict, matchCount, error }: VerifiedCandidate): CandidateReport {
  const report: CandidateReport = {
    expression: candidate.expression,
    strategy: candidate.strategy,
    confidence: candidate.confidence,
    verdict,
    matchCount,
    origin: candidate.origin,
    element: { tag: candidate.source.tag, index: candidate.source.index },
  };
  return error === undefined ? report : { ...report, error };
}

/**
 * Stable sort, so ranked candidates keep their tie-break order and
 * off-target external locators follow ranked ones of equal confidence
 */
function byConfidence(reports: CandidateReport[]): CandidateReport[] {
  return reports.sort((a, b) => b.confidence - a.confidence);
}
