import { describe, test, expect } from 'vitest';
import { LocatorService, screenSuggestions, toXPathResponse } from '../LocatorService.js';
import type { AIDetectionResult, XPathSuggestionRequest, XPathSuggestionResult, XPathSuggestionSource } from '../../ai/types.js';
import { HtmlDocument } from '../../dom/HtmlDocument.js';
import { resolveInDocument } from '../../locator/index.js';
import { InvalidExpressionError, ParseError } from '../../types/errors.js';

const twinsHtml = '<body><div class="item">Item</div><div class="item">Item</div><p>x</p></body>';
const postcodeHtml =
  '<form><input class="entry" type="text" data-kind="billing-postcode">' +
  '<input class="entry" type="text" data-kind="shipping-postcode"></form>';
const postcodeXPath = "//input[@data-kind='billing-postcode' and @class='entry']";

function fakeSource(
  response: AIDetectionResult<XPathSuggestionResult>,
  isEnabled = true
): XPathSuggestionSource & { requests: XPathSuggestionRequest[] } {
  const requests: XPathSuggestionRequest[] = [];
  return {
    isEnabled,
    requests,
    async suggestXPaths(request) {
      requests.push(request);
      return response;
    },
  };
}

const suggestions: AIDetectionResult<XPathSuggestionResult> = {
  success: true,
  data: { candidates: [{ xpath: postcodeXPath, confidence: 1 }, { xpath: '//input[@' }] },
  source: 'ai',
  latencyMs: 5,
};

describe('LocatorService', () => {
  test('resolves with rules only when AI is not requested', async () => {
    const source = fakeSource(suggestions);
    const service = new LocatorService(source);

    const { result, ai } = await service.generate({ html_content: twinsHtml, target_description: 'item' });

    expect(source.requests).toHaveLength(0);
    expect(ai).toEqual({ requested: false, used: false, suggestions: 0, rejected: [] });
    expect(result.status === 'success' && result.candidate.expression).toBe('//div[1]');
  });

  test('verifies AI suggestions and lets a unique one win', async () => {
    const source = fakeSource(suggestions);
    const service = new LocatorService(source);

    const outcome = await service.generate({
      html_content: postcodeHtml,
      target_description: 'billing postcode',
      element_type: 'input',
      additional_context: 'checkout form',
      use_ai: true,
    });

    expect(source.requests).toEqual([
      {
        html: postcodeHtml,
        description: 'billing postcode',
        elementType: 'input',
        additionalContext: 'checkout form',
      },
    ]);
    expect(outcome.ai).toMatchObject({ requested: true, used: true, suggestions: 2, latency_ms: 5 });
    expect(outcome.ai.rejected.map((r) => r.xpath)).toEqual(['//input[@']);

    const response = toXPathResponse(outcome);
    expect(response.success).toBe(true);
    expect(response.xpath_locators).toEqual([postcodeXPath]);
    expect(response.confidence_scores).toEqual([0.792]);
    expect(response.strategy).toBe('combined');
    expect(response.alternative_locators).toEqual(['//input[1]']);
    expect(response.reasoning).toBe(
      'Selected AI-suggested combined locator matching exactly one element (1 unique alternate(s), 2 rejected)'
    );
    expect(response.candidates[0]).toEqual({
      xpath: postcodeXPath,
      strategy: 'combined',
      confidence: 0.792,
      verdict: 'unique',
      match_count: 1,
      origin: 'external',
    });
    expect(response.candidates.map((c) => c.confidence)).toEqual([0.792, 0.682, 0.621, 0.15]);
  });

  test('carries evaluation errors into candidate summaries', () => {
    const result = resolveInDocument(HtmlDocument.parse(twinsHtml), 'item', {
      externalCandidates: [{ expression: '//div[' }],
    });
    const response = toXPathResponse({ result, ai: { requested: false, used: false, suggestions: 0, rejected: [] } });
    const last = response.candidates.at(-1);

    expect(last).toMatchObject({ xpath: '//div[', verdict: 'no-match', match_count: 0, origin: 'external' });
    expect(last?.error).toMatch(/^Invalid XPath expression "\/\/div\[":/);
    expect(response.candidates[0]).not.toHaveProperty('error');
  });

  test('falls back to rules when the AI call fails', async () => {
    const service = new LocatorService(
      fakeSource({ success: false, error: 'quota exhausted', source: 'fallback', latencyMs: 3 })
    );

    const outcome = await service.generate({ html_content: twinsHtml, target_description: 'item', use_ai: true });

    expect(outcome.ai).toEqual({
      requested: true,
      used: false,
      suggestions: 0,
      rejected: [],
      latency_ms: 3,
      error: 'quota exhausted',
    });
    expect(toXPathResponse(outcome).xpath_locators).toEqual(['//div[1]']);
  });

  test('notes when AI is requested but not enabled', async () => {
    const service = new LocatorService(fakeSource(suggestions, false));

    expect(service.aiEnabled).toBe(false);
    const { ai } = await service.generate({ html_content: twinsHtml, target_description: 'item', use_ai: true });
    expect(ai.error).toBe('AI suggestions are not enabled');
  });

  test('shapes failures with their reason', async () => {
    const service = new LocatorService();
    const response = toXPathResponse(
      await service.generate({ html_content: twinsHtml, target_description: 'shopping cart' })
    );

    expect(response).toEqual({
      success: false,
      xpath_locators: [],
      confidence_scores: [],
      alternative_locators: [],
      reasoning: 'No element matches "shopping cart"',
      strategy: null,
      failure_reason: 'TargetNotFound',
      candidates: [],
      ai: { requested: false, used: false, suggestions: 0, rejected: [] },
    });
  });

  test('rejects unparseable HTML', async () => {
    await expect(new LocatorService().generate({ html_content: '', target_description: 'x' })).rejects.toThrow(
      ParseError
    );
  });

  describe('verify', () => {
    test('reports the verdict for a caller-supplied XPath', () => {
      expect(new LocatorService().verify(twinsHtml, "//div[@class='item']")).toEqual({
        success: true,
        xpath: "//div[@class='item']",
        verdict: 'ambiguous',
        match_count: 2,
      });
    });

    test('throws for malformed XPath', () => {
      expect(() => new LocatorService().verify(twinsHtml, '//div[')).toThrow(InvalidExpressionError);
    });
  });

  test('screenSuggestions separates malformed expressions', () => {
    const document = HtmlDocument.parse(twinsHtml);
    const { accepted, rejected } = screenSuggestions(document, [
      { expression: '//p' },
      { expression: '//p[' },
      { expression: '   ' },
    ]);

    expect(accepted).toEqual([{ expression: '//p' }]);
    expect(rejected.map((r) => r.xpath)).toEqual(['//p[', '   ']);
    expect(rejected[1].error).toBe('Invalid XPath expression "   ": expression is empty');
  });
});
