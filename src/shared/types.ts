// ============================================================================
// SHARED TYPES - HTTP API of the XPath locator service
// ============================================================================
// Field names follow the JSON the API has always spoken (snake_case).

export type StrategyName = 'id' | 'name' | 'class' | 'text' | 'combined' | 'positional';

export type VerdictKind = 'unique' | 'ambiguous' | 'no-match';

// Requests
export interface HtmlRequest {
  html_content: string;
}

export interface XPathRequest extends HtmlRequest {
  target_description: string;
  element_type?: string;
  additional_context?: string;
  /** Ask the AI source for extra candidates; they are still verified */
  use_ai?: boolean;
}

export interface VerifyXPathRequest extends HtmlRequest {
  xpath: string;
}

// Responses
export interface LocatorSummary {
  xpath: string;
  strategy: StrategyName;
  confidence: number;
  verdict: VerdictKind;
  match_count: number;
  origin: 'rule' | 'external';
  /** Evaluation error, for an expression the engine could not run */
  error?: string;
}

export interface RejectedSuggestion {
  xpath: string;
  error: string;
}

export interface AiUsage {
  requested: boolean;
  used: boolean;
  suggestions: number;
  rejected: RejectedSuggestion[];
  error?: string;
  latency_ms?: number;
}

export interface XPathResponse {
  success: boolean;
  /** Winning locator first; empty on failure */
  xpath_locators: string[];
  confidence_scores: number[];
  /** Unique alternates, descending confidence */
  alternative_locators: string[];
  reasoning: string;
  strategy: StrategyName | null;
  failure_reason?: 'TargetNotFound' | 'NoUniqueLocator';
  /** Every candidate considered, with its uniqueness verdict */
  candidates: LocatorSummary[];
  ai: AiUsage;
}

export interface VerifyXPathResponse {
  success: true;
  xpath: string;
  verdict: VerdictKind;
  match_count: number;
}
