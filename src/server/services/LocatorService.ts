// ============================================================================
// LOCATOR SERVICE
// ============================================================================
// Orchestrates one /generate-xpath request: parse, optionally gather AI
// suggestions, and resolve. AI suggestions only ever enter as external
// candidates of the engine, so they pass the same uniqueness check and
// scoring as rule-based ones.

import type { XPathSuggestionSource } from '../ai/types.js';
import { HtmlDocument } from '../dom/HtmlDocument.js';
import { resolveInDocument } from '../locator/index.js';
import { verifyExpression } from '../locator/UniquenessVerifier.js';
import { InvalidExpressionError, errorMessage } from '../types/errors.js';
import { FailureReason, LocatorStrategy } from '../types/locator-types.js';
import type { CandidateReport, ExternalCandidate, ResolutionResult } from '../types/locator-types.js';
import type {
  AiUsage,
  LocatorSummary,
  RejectedSuggestion,
  StrategyName,
  VerifyXPathResponse,
  XPathRequest,
  XPathResponse,
} from '../../shared/types.js';

const STRATEGY_NAMES: Readonly<Record<LocatorStrategy, StrategyName>> = {
  [LocatorStrategy.ID]: 'id',
  [LocatorStrategy.NAME]: 'name',
  [LocatorStrategy.CLASS]: 'class',
  [LocatorStrategy.TEXT]: 'text',
  [LocatorStrategy.COMBINED]: 'combined',
  [LocatorStrategy.POSITIONAL]: 'positional',
};

const FAILURE_NAMES: Readonly<Record<FailureReason, 'TargetNotFound' | 'NoUniqueLocator'>> = {
  [FailureReason.TARGET_NOT_FOUND]: 'TargetNotFound',
  [FailureReason.NO_UNIQUE_LOCATOR]: 'NoUniqueLocator',
};

export interface LocatorOutcome {
  result: ResolutionResult;
  ai: AiUsage;
}

function toSummary(report: CandidateReport): LocatorSummary {
  const summary: LocatorSummary = {
    xpath: report.expression,
    strategy: STRATEGY_NAMES[report.strategy],
    confidence: report.confidence,
    verdict: report.verdict.kind,
    match_count: report.matchCount,
    origin: report.origin,
  };
  return report.error === undefined ? summary : { ...summary, error: report.error };
}

/**
 * Shape a resolution result as the /generate-xpath response body
 */
export function toXPathResponse({ result, ai }: LocatorOutcome): XPathResponse {
  if (result.status === 'failure') {
    return {
      success: false,
      xpath_locators: [],
      confidence_scores: [],
      alternative_locators: [],
      reasoning: result.message,
      strategy: null,
      failure_reason: FAILURE_NAMES[result.reason],
      candidates: result.attemptedStrategies.map(toSummary),
      ai,
    };
  }

  const { candidate, alternateCandidates } = result;
  const uniqueAlternates = alternateCandidates.filter((report) => report.verdict.kind === 'unique');
  const origin = candidate.origin === 'external' ? 'AI-suggested' : 'rule-based';

  return {
    success: true,
    xpath_locators: [candidate.expression],
    confidence_scores: [candidate.confidence],
    alternative_locators: uniqueAlternates.map((report) => report.expression),
    reasoning:
      `Selected ${origin} ${STRATEGY_NAMES[candidate.strategy]} locator matching exactly one element ` +
      `(${uniqueAlternates.length} unique alternate(s), ${alternateCandidates.length - uniqueAlternates.length} rejected)`,
    strategy: STRATEGY_NAMES[candidate.strategy],
    candidates: [candidate, ...alternateCandidates].map(toSummary),
    ai,
  };
}

export class LocatorService {
  constructor(private readonly suggestions: XPathSuggestionSource | null = null) {}

  get aiEnabled(): boolean {
    return this.suggestions?.isEnabled ?? false;
  }

  async generate(request: XPathRequest, requestId = '-'): Promise<LocatorOutcome> {
    const document = HtmlDocument.parse(request.html_content);
    const ai: AiUsage = { requested: request.use_ai === true, used: false, suggestions: 0, rejected: [] };
    const externalCandidates: ExternalCandidate[] = [];

    if (ai.requested && this.suggestions?.isEnabled) {
      const response = await this.suggestions.suggestXPaths({
        html: request.html_content,
        description: request.target_description,
        elementType: request.element_type,
        additionalContext: request.additional_context,
      });
      ai.latency_ms = response.latencyMs;

      if (response.success && response.data) {
        ai.used = true;
        ai.suggestions = response.data.candidates.length;
        const { accepted, rejected } = screenSuggestions(
          document,
          response.data.candidates.map((suggestion) => ({
            expression: suggestion.xpath,
            reasoning: suggestion.reasoning,
          }))
        );
        externalCandidates.push(...accepted);
        ai.rejected = rejected;
        console.log(
          `[LocatorService] ${requestId} AI proposed ${ai.suggestions} XPath(s), ${rejected.length} malformed`
        );
      } else {
        ai.error = response.error ?? 'AI suggestion failed';
        console.warn(`[LocatorService] ${requestId} AI suggestions unavailable, using rules only: ${ai.error}`);
      }
    } else if (ai.requested) {
      ai.error = 'AI suggestions are not enabled';
    }

    const result = resolveInDocument(document, request.target_description, {
      elementTypeHint: request.element_type,
      externalCandidates,
    });

    if (result.status === 'success') {
      console.log(
        `[LocatorService] ${requestId} Resolved "${request.target_description}" → ${result.candidate.expression} ` +
          `(${result.strategy}, ${result.confidence})`
      );
    } else {
      console.log(`[LocatorService] ${requestId} ${result.reason}: ${result.message}`);
    }

    return { result, ai };
  }

  /**
   * Check a caller-supplied XPath. Throws InvalidExpressionError when malformed.
   */
  verify(html: string, xpath: string): VerifyXPathResponse {
    const document = HtmlDocument.parse(html);
    const { verdict, matchCount } = verifyExpression(document, xpath);
    return { success: true, xpath, verdict: verdict.kind, match_count: matchCount };
  }
}

/**
 * Split external expressions into well-formed ones and those the document
 * model rejects, keeping the rejection message for the caller
 */
export function screenSuggestions(
  document: HtmlDocument,
  suggestions: readonly ExternalCandidate[]
): { accepted: ExternalCandidate[]; rejected: RejectedSuggestion[] } {
  const accepted: ExternalCandidate[] = [];
  const rejected: RejectedSuggestion[] = [];

  for (const suggestion of suggestions) {
    try {
      document.evaluate(suggestion.expression);
      accepted.push(suggestion);
    } catch (error) {
      if (!(error instanceof InvalidExpressionError)) throw error;
      rejected.push({ xpath: suggestion.expression, error: errorMessage(error) });
    }
  }

  return { accepted, rejected };
}
