// ============================================================================
// AI SUGGESTION TYPES
// ============================================================================

export interface AIDetectionResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  source: 'ai' | 'fallback';
  latencyMs: number;
}

/**
 * XPath suggestion as returned by the model
 */
export interface XPathSuggestion {
  xpath: string;
  reasoning?: string;
  /** Self-reported; never used for ranking */
  confidence?: number;
}

export interface XPathSuggestionResult {
  candidates: XPathSuggestion[];
  reasoning?: string;
}

export interface XPathSuggestionRequest {
  html: string;
  description: string;
  elementType?: string;
  additionalContext?: string;
}

/**
 * Anything that can propose XPath candidates for a description
 */
export interface XPathSuggestionSource {
  readonly isEnabled: boolean;
  suggestXPaths(request: XPathSuggestionRequest): Promise<AIDetectionResult<XPathSuggestionResult>>;
}

/**
 * Minimal text-generation surface the service needs from a model client
 */
export interface TextGenerator {
  generateText(prompt: string): Promise<string>;
}
