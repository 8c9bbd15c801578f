import { describe, test, expect } from 'vitest';
import { HtmlDocument, byTag } from '../../dom/HtmlDocument.js';
import { elementLabel, generateTestScenarios } from '../ScenarioGenerator.js';
import { LocatorStrategy } from '../../types/locator-types.js';

const loginHtml = `
  <form id="login">
    <input type="text" name="user">
    <input type="hidden" name="token" value="test-secret">
    <button type="submit" id="go">Sign in</button>
  </form>
  <a href="/help">Help</a>
`;

describe('ScenarioGenerator', () => {
  test('drafts one scenario per actionable element', () => {
    const scenarios = generateTestScenarios(loginHtml);

    expect(scenarios.map((s) => [s.id, s.name, s.priority])).toEqual([
      ['scenario_1', 'Test user functionality', 'medium'],
      ['scenario_2', 'Test Sign in functionality', 'high'],
      ['scenario_3', 'Test Help functionality', 'medium'],
    ]);
  });

  test('fills in steps and expected result from the label', () => {
    const [, button] = generateTestScenarios(loginHtml);

    expect(button.description).toBe('Verify Sign in works correctly');
    expect(button.steps).toEqual([
      'Navigate to the page',
      'Locate Sign in element',
      'Interact with Sign in',
      'Verify expected behavior',
    ]);
    expect(button.expectedResult).toBe('Sign in should work as expected');
  });

  test('attaches the best unique locator', () => {
    const [input, button, link] = generateTestScenarios(loginHtml);

    expect(input.locator?.xpath).toBe("//input[@name='user']");
    expect(input.locator?.strategy).toBe(LocatorStrategy.NAME);
    expect(input.locator?.confidence).toBeCloseTo(0.817, 3);
    expect(button.locator?.xpath).toBe("//button[@id='go']");
    expect(link.locator?.xpath).toBe("//a[text()='Help']");
    expect(link.locator?.strategy).toBe(LocatorStrategy.TEXT);
  });

  test('leaves the locator empty when no unique one exists', () => {
    const [first, second] = generateTestScenarios('<p><a>Go</a></p><p><a>Go</a></p>');

    expect(first.locator).toBeNull();
    expect(second.locator).toBeNull();
  });

  test('labels elements without text by their attributes', () => {
    const doc = HtmlDocument.parse('<input placeholder="Search products"><input><button aria-label="Close"></button>');
    const [search, bare] = doc.findElements(byTag('input'));
    const [close] = doc.findElements(byTag('button'));

    expect(elementLabel(search)).toBe('Search products');
    expect(elementLabel(bare)).toBe('input');
    expect(elementLabel(close)).toBe('Close');
  });
});
