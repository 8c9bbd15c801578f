// ============================================================================
// HTTP APP - Express routes around the locator engine
// ============================================================================

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { v4 as uuid } from 'uuid';

import type { AppConfig } from './config/AppConfig.js';
import { analyzeStructure } from './locator/index.js';
import { generateTestScenarios } from './analysis/ScenarioGenerator.js';
import { LocatorService, toXPathResponse } from './services/LocatorService.js';
import { RequestValidationError, toErrorResponse } from './types/errors.js';
import type { HtmlRequest, VerifyXPathRequest, XPathRequest } from '../shared/types.js';

export const VERSION = '1.0.0';

// ============================================================================
// REQUEST VALIDATION
// ============================================================================

function asBody(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RequestValidationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

function requiredString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new RequestValidationError(`${field} is required`, field);
  }
  return value;
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new RequestValidationError(`${field} must be a string`, field);
  }
  return value.trim() === '' ? undefined : value;
}

export function parseHtmlRequest(raw: unknown): HtmlRequest {
  return { html_content: requiredString(asBody(raw), 'html_content') };
}

export function parseXPathRequest(raw: unknown): XPathRequest {
  const body = asBody(raw);
  const rawUseAi = body.use_ai;
  let useAi: boolean | undefined;
  if (typeof rawUseAi === 'boolean') {
    useAi = rawUseAi;
  } else if (rawUseAi !== undefined && rawUseAi !== null) {
    throw new RequestValidationError('use_ai must be a boolean', 'use_ai');
  }

  return {
    html_content: requiredString(body, 'html_content'),
    target_description: requiredString(body, 'target_description'),
    element_type: optionalString(body, 'element_type'),
    additional_context: optionalString(body, 'additional_context'),
    use_ai: useAi,
  };
}

export function parseVerifyRequest(raw: unknown): VerifyXPathRequest {
  const body = asBody(raw);
  return {
    html_content: requiredString(body, 'html_content'),
    xpath: requiredString(body, 'xpath'),
  };
}

// ============================================================================
// EXPRESS APP
// ============================================================================

export interface AppDependencies {
  locatorService: LocatorService;
}

export function createApp(config: AppConfig, deps: AppDependencies): express.Express {
  const { locatorService } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: config.bodyLimit }));

  // Health check
  app.get('/health', (_, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      components: {
        locator_engine: 'ready',
        ai_suggestions: locatorService.aiEnabled ? 'ready' : 'disabled',
      },
    });
  });

  app.get('/api', (_, res) => {
    res.json({
      platform: 'XPath Locator Service',
      version: VERSION,
      description: 'Resolves element descriptions to unique, verified XPath locators',
      features: [
        'XPath generation (id, name, class, text, combined, positional)',
        'Confidence scoring with uniqueness verification',
        'HTML structure analysis',
        'Test scenario generation',
        'Optional AI-suggested candidates, re-verified before use',
      ],
      endpoints: {
        generate_xpath: 'POST /generate-xpath',
        verify_xpath: 'POST /verify-xpath',
        analyze_html: 'POST /analyze-html',
        generate_test_scenarios: 'POST /generate-test-scenarios',
        health: 'GET /health',
      },
    });
  });

  app.post('/generate-xpath', async (req, res, next) => {
    const requestId = uuid();
    try {
      const request = parseXPathRequest(req.body);
      console.log(`[Server] ${requestId} generate-xpath "${request.target_description}"`);
      const outcome = await locatorService.generate(request, requestId);
      res.json(toXPathResponse(outcome));
    } catch (error) {
      next(error);
    }
  });

  app.post('/verify-xpath', (req, res, next) => {
    try {
      const request = parseVerifyRequest(req.body);
      res.json(locatorService.verify(request.html_content, request.xpath));
    } catch (error) {
      next(error);
    }
  });

  app.post('/analyze-html', (req, res, next) => {
    try {
      const { html_content } = parseHtmlRequest(req.body);
      res.json({ success: true, analysis: analyzeStructure(html_content) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/generate-test-scenarios', (req, res, next) => {
    try {
      const { html_content } = parseHtmlRequest(req.body);
      const scenarios = generateTestScenarios(html_content);
      res.json({ success: true, scenarios, total_scenarios: scenarios.length });
    } catch (error) {
      next(error);
    }
  });

  // Express identifies error middleware by its four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const bodyParserStatus = expressErrorStatus(error);
    if (bodyParserStatus !== undefined) {
      res.status(bodyParserStatus).json({ success: false, error: 'Malformed request body', type: 'validation' });
      return;
    }

    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      console.error(`[Server] ${req.method} ${req.path} failed:`, error);
    } else {
      console.warn(`[Server] ${req.method} ${req.path} rejected: ${body.error}`);
    }
    res.status(status).json(body);
  });

  return app;
}

/**
 * Status carried by body-parser errors (invalid JSON, payload too large)
 */
function expressErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error) || !('type' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}
