// ============================================================================
// GEMINI AI SERVICE
// ============================================================================
// Optional XPath suggestion source backed by Google Gemini, with rate
// limiting, retry logic, and lenient JSON parsing. Its output is never
// trusted directly: every suggestion goes back through the locator engine.

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { AiConfig } from '../config/AppConfig.js';
import { errorMessage } from '../types/errors.js';
import type {
  AIDetectionResult,
  TextGenerator,
  XPathSuggestion,
  XPathSuggestionRequest,
  XPathSuggestionResult,
  XPathSuggestionSource,
} from './types.js';

const MAX_SUGGESTIONS = 5;

// Rate limiter - simple token bucket
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per second

  constructor(maxTokens: number = 10, refillRatePerMinute: number = 10) {
    this.maxTokens = maxTokens;
    this.tokens = maxTokens;
    this.refillRate = refillRatePerMinute / 60;
    this.lastRefill = Date.now();
  }

  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      const waitTime = ((1 - this.tokens) / this.refillRate) * 1000;
      console.log(`[GeminiService] Rate limited, waiting ${Math.round(waitTime)}ms`);
      await new Promise((resolve) => setTimeout(resolve, waitTime));
      this.refill();
    }
    this.tokens -= 1;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}

export interface GeminiServiceOptions {
  /** Replaces the Gemini client, e.g. in tests */
  generator?: TextGenerator;
  /** Base delay for exponential backoff between retries */
  retryDelayMs?: number;
}

/**
 * Parse JSON from a model response, handling markdown code fences and
 * JSON embedded in prose
 */
export function parseJsonResponse(text: string): unknown {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  cleaned = cleaned.trim();

  try {
    return JSON.parse(cleaned);
  } catch {
    const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
    if (jsonMatch) {
      return JSON.parse(jsonMatch[0]);
    }
    throw new Error('No valid JSON found in response');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only well-shaped suggestions; the model's output is untrusted
 */
export function toSuggestionResult(value: unknown): XPathSuggestionResult | null {
  if (!isRecord(value)) return null;
  const entries: unknown = value.candidates;
  if (!Array.isArray(entries)) return null;

  const candidates: XPathSuggestion[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const { xpath, reasoning, confidence } = entry;
    if (typeof xpath !== 'string' || xpath.trim() === '') continue;

    candidates.push({
      xpath: xpath.trim(),
      reasoning: typeof reasoning === 'string' ? reasoning : undefined,
      confidence: typeof confidence === 'number' ? confidence : undefined,
    });
  }

  const { reasoning } = value;
  return {
    candidates: candidates.slice(0, MAX_SUGGESTIONS),
    reasoning: typeof reasoning === 'string' ? reasoning : undefined,
  };
}

/**
 * Main Gemini AI Service
 */
export class GeminiService implements XPathSuggestionSource {
  private readonly generator: TextGenerator | null;
  private readonly rateLimiter: RateLimiter;
  private readonly retryDelayMs: number;
  public readonly isEnabled: boolean;

  constructor(
    private readonly config: AiConfig,
    options: GeminiServiceOptions = {}
  ) {
    this.generator = options.generator ?? GeminiService.createGenerator(config);
    this.isEnabled = this.generator !== null;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.rateLimiter = new RateLimiter(config.requestsPerMinute, config.requestsPerMinute);
  }

  private static createGenerator(config: AiConfig): TextGenerator | null {
    if (!config.apiKey) {
      console.warn('[GeminiService] GEMINI_API_KEY not set - AI suggestions disabled');
      return null;
    }

    const model = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({
      model: config.model,
      generationConfig: {
        responseMimeType: 'application/json',
      },
    });
    console.log(`[GeminiService] Initialized with ${config.model} (JSON mode)`);

    return {
      async generateText(prompt: string): Promise<string> {
        const result = await model.generateContent(prompt);
        return result.response.text();
      },
    };
  }

  /**
   * Call the model with retry on rate-limit and timeout errors
   */
  private async callWithRetry<T>(prompt: string, parse: (value: unknown) => T | null): Promise<AIDetectionResult<T>> {
    if (!this.isEnabled || !this.generator) {
      return {
        success: false,
        error: 'AI service not enabled',
        source: 'fallback',
        latencyMs: 0,
      };
    }

    const startTime = Date.now();
    const maxRetries = this.config.maxRetries;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        await this.rateLimiter.acquire();

        const responseText = await this.generator.generateText(prompt);
        const parsed = parse(parseJsonResponse(responseText));
        if (!parsed) {
          throw new Error('Failed to parse response');
        }

        return {
          success: true,
          data: parsed,
          source: 'ai',
          latencyMs: Date.now() - startTime,
        };
      } catch (error) {
        const message = errorMessage(error);
        const isRetryable = message.includes('429') || message.includes('rate') || message.includes('timeout');

        console.error(`[GeminiService] Attempt ${attempt + 1} failed:`, message);

        if (attempt < maxRetries && isRetryable) {
          const backoff = Math.pow(2, attempt) * this.retryDelayMs;
          console.log(`[GeminiService] Retrying in ${backoff}ms...`);
          await new Promise((resolve) => setTimeout(resolve, backoff));
        } else {
          return {
            success: false,
            error: message,
            source: 'fallback',
            latencyMs: Date.now() - startTime,
          };
        }
      }
    }

    return {
      success: false,
      error: 'Max retries exceeded',
      source: 'fallback',
      latencyMs: Date.now() - startTime,
    };
  }

  // ===========================================================================
  // XPATH SUGGESTIONS
  // ===========================================================================

  async suggestXPaths(request: XPathSuggestionRequest): Promise<AIDetectionResult<XPathSuggestionResult>> {
    const html = request.html.substring(0, this.config.htmlSnippetLimit);

    const prompt = `You are an XPath expert for web test automation. Generate XPath locators for ONE element in this HTML.

TARGET ELEMENT: ${request.description}
${request.elementType ? `ELEMENT TYPE: ${request.elementType}\n` : ''}${request.additionalContext ? `CONTEXT: ${request.additionalContext}\n` : ''}
HTML:
${html}

RULES:
1. Use XPath 1.0 only, absolute from the document (start with // or /)
2. Each XPath must select exactly one element: the target
3. Prefer stable attributes (id, name, data-testid) over classes, text, and positions
4. Quote values with single quotes; use concat() for values containing both quote kinds
5. Return ${MAX_SUGGESTIONS} candidates at most, most reliable first

Return ONLY valid JSON:
{
  "candidates": [
    { "xpath": "//button[@id='submit']", "reasoning": "Unique id on the submit button" },
    { "xpath": "//form[@name='login']//button[@type='submit']", "reasoning": "Submit button inside the login form" }
  ],
  "reasoning": "Short overall explanation"
}`;

    return this.callWithRetry(prompt, toSuggestionResult);
  }
}
