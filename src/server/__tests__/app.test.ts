import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { once } from 'events';
import type { Server } from 'http';
import { createApp, parseXPathRequest, VERSION } from '../app.js';
import { DEFAULT_CONFIG } from '../config/AppConfig.js';
import { LocatorService } from '../services/LocatorService.js';
import { RequestValidationError } from '../types/errors.js';

const submitHtml = '<form><input name="q"><button id="submit-btn">Submit</button></form>';

describe('HTTP app', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp(DEFAULT_CONFIG, { locatorService: new LocatorService() });
    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  async function post(path: string, body: unknown): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
    return { status: response.status, body: await response.json() };
  }

  test('GET /health reports component status', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: 'ok',
      version: VERSION,
      components: { locator_engine: 'ready', ai_suggestions: 'disabled' },
    });
  });

  test('POST /generate-xpath returns the winning locator', async () => {
    const { status, body } = await post('/generate-xpath', {
      html_content: submitHtml,
      target_description: 'Submit button',
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      xpath_locators: ["//button[@id='submit-btn']"],
      confidence_scores: [0.941],
      alternative_locators: ["//button[text()='Submit']", '//button[1]'],
      strategy: 'id',
    });
  });

  test('POST /generate-xpath reports resolution failures in the body', async () => {
    const { status, body } = await post('/generate-xpath', {
      html_content: submitHtml,
      target_description: 'shopping cart',
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({ success: false, failure_reason: 'TargetNotFound', strategy: null });
  });

  test('POST /generate-xpath validates required fields', async () => {
    const { status, body } = await post('/generate-xpath', { html_content: submitHtml });

    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: 'target_description is required',
      type: 'validation',
      field: 'target_description',
    });
  });

  test('rejects HTML without markup as a parse error', async () => {
    const { status, body } = await post('/generate-xpath', {
      html_content: 'no markup here',
      target_description: 'anything',
    });

    expect(status).toBe(400);
    expect(body).toEqual({ success: false, error: 'HTML input contains no element markup', type: 'parse' });
  });

  test('POST /verify-xpath reports the verdict', async () => {
    const { status, body } = await post('/verify-xpath', { html_content: submitHtml, xpath: '//button' });

    expect(status).toBe(200);
    expect(body).toEqual({ success: true, xpath: '//button', verdict: 'unique', match_count: 1 });
  });

  test('POST /verify-xpath rejects malformed XPath', async () => {
    const { status, body } = await post('/verify-xpath', { html_content: submitHtml, xpath: '//div[' });

    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false, type: 'invalid_expression' });
  });

  test('POST /analyze-html summarizes the document', async () => {
    const { status, body } = await post('/analyze-html', { html_content: '<p>x</p>' });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      analysis: { totalElements: 4, maxDepth: 3, tagCounts: { body: 1, head: 1, html: 1, p: 1 } },
    });
  });

  test('POST /generate-test-scenarios drafts scenarios', async () => {
    const { status, body } = await post('/generate-test-scenarios', { html_content: '<button id="go">Go</button>' });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      total_scenarios: 1,
      scenarios: [{ id: 'scenario_1', name: 'Test Go functionality', priority: 'high' }],
    });
  });

  test('rejects malformed JSON bodies', async () => {
    const { status, body } = await post('/analyze-html', '{"html_content": ');

    expect(status).toBe(400);
    expect(body).toEqual({ success: false, error: 'Malformed request body', type: 'validation' });
  });

  test('rejects non-object bodies', async () => {
    const { status, body } = await post('/analyze-html', []);

    expect(status).toBe(400);
    expect(body).toMatchObject({ error: 'Request body must be a JSON object', type: 'validation' });
  });
});

describe('parseXPathRequest', () => {
  test('keeps optional fields and drops blank ones', () => {
    expect(
      parseXPathRequest({
        html_content: '<p>x</p>',
        target_description: 'x',
        element_type: ' ',
        additional_context: 'footer',
        use_ai: true,
      })
    ).toEqual({
      html_content: '<p>x</p>',
      target_description: 'x',
      element_type: undefined,
      additional_context: 'footer',
      use_ai: true,
    });
  });

  test('requires use_ai to be a boolean', () => {
    expect(() => parseXPathRequest({ html_content: '<p>x</p>', target_description: 'x', use_ai: 'yes' })).toThrow(
      RequestValidationError
    );
  });
});
