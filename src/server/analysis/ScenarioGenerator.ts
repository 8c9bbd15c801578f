// ============================================================================
// TEST SCENARIO GENERATOR
// ============================================================================
// Drafts one functional test scenario per actionable element, each carrying
// the element's verified locator.

import { HtmlDocument } from '../dom/HtmlDocument.js';
import type { ElementNode } from '../dom/HtmlDocument.js';
import { resolveElement } from '../locator/index.js';
import type { LocatorStrategy } from '../types/locator-types.js';
import { isInteractive } from './StructureAnalyzer.js';

export type ScenarioPriority = 'high' | 'medium';

export interface ScenarioLocator {
  xpath: string;
  strategy: LocatorStrategy;
  confidence: number;
}

export interface TestScenario {
  id: string;
  name: string;
  description: string;
  steps: string[];
  expectedResult: string;
  priority: ScenarioPriority;
  /** Null when no unique locator exists for the element */
  locator: ScenarioLocator | null;
}

const SCENARIO_TAGS = new Set(['button', 'input', 'a']);

/**
 * Human-readable name for an element: its text, else its most telling attribute
 */
export function elementLabel(element: ElementNode): string {
  const fallbacks = ['value', 'aria-label', 'placeholder', 'title', 'name', 'id'];
  if (element.text.length > 0) return element.text;

  for (const attribute of fallbacks) {
    const value = element.attributes.get(attribute)?.trim();
    if (value) return value;
  }
  return element.tag;
}

function locatorFor(document: HtmlDocument, element: ElementNode): ScenarioLocator | null {
  const result = resolveElement(document, element);
  if (result.status !== 'success') return null;

  return {
    xpath: result.candidate.expression,
    strategy: result.strategy,
    confidence: result.confidence,
  };
}

export function buildScenarios(document: HtmlDocument): TestScenario[] {
  const targets = document.findElements((element) => SCENARIO_TAGS.has(element.tag) && isInteractive(element));

  return targets.map((element, i): TestScenario => {
    const label = elementLabel(element);
    return {
      id: `scenario_${i + 1}`,
      name: `Test ${label} functionality`,
      description: `Verify ${label} works correctly`,
      steps: [
        'Navigate to the page',
        `Locate ${label} element`,
        `Interact with ${label}`,
        'Verify expected behavior',
      ],
      expectedResult: `${label} should work as expected`,
      priority: element.attributes.has('id') ? 'high' : 'medium',
      locator: locatorFor(document, element),
    };
  });
}

export function generateTestScenarios(html: string): TestScenario[] {
  return buildScenarios(HtmlDocument.parse(html));
}
