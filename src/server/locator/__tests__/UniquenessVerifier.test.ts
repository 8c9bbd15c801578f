import { describe, test, expect } from 'vitest';
import { HtmlDocument, byTag } from '../../dom/HtmlDocument.js';
import { generateCandidates } from '../CandidateGenerator.js';
import { isUnique, verdictFor, verify, verifyExpression } from '../UniquenessVerifier.js';
import { InvalidExpressionError } from '../../types/errors.js';
import { LocatorStrategy } from '../../types/locator-types.js';

const html = `
  <ul>
    <li class="row">A</li>
    <li class="row">B</li>
  </ul>
  <p id="only">x</p>
`;

describe('UniquenessVerifier', () => {
  const doc = HtmlDocument.parse(html);
  const [firstRow, secondRow] = doc.findElements(byTag('li'));

  test('reports a single match as unique', () => {
    const result = verifyExpression(doc, "//p[@id='only']");
    expect(result.verdict).toEqual({ kind: 'unique' });
    expect(result.matchCount).toBe(1);
    expect(result.matches.map((element) => element.tag)).toEqual(['p']);
  });

  test('reports several matches as ambiguous with their count', () => {
    const result = verifyExpression(doc, "//li[@class='row']");
    expect(result.verdict).toEqual({ kind: 'ambiguous', matchCount: 2 });
    expect(result.matches).toEqual([firstRow, secondRow]);
  });

  test('reports no matches as no-match', () => {
    expect(verifyExpression(doc, "//p[@id='missing']").verdict).toEqual({ kind: 'no-match', matchCount: 0 });
  });

  test('treats a match on the wrong element as no-match', () => {
    const result = verifyExpression(doc, '//li[1]', (element) => element === secondRow);
    expect(result.verdict).toEqual({ kind: 'no-match', matchCount: 1 });
  });

  test('verifies generated candidates against their source element', () => {
    const candidates = generateCandidates(secondRow);
    const byStrategy = new Map(candidates.map((c) => [c.strategy, verify(c, doc)]));

    expect(byStrategy.get(LocatorStrategy.CLASS)).toEqual({ kind: 'ambiguous', matchCount: 2 });
    expect(byStrategy.get(LocatorStrategy.TEXT)).toEqual({ kind: 'unique' });
    expect(byStrategy.get(LocatorStrategy.POSITIONAL)).toEqual({ kind: 'unique' });
  });

  test('rejects malformed expressions', () => {
    expect(() => verifyExpression(doc, '//li[')).toThrow(InvalidExpressionError);
  });

  test('verdictFor and isUnique agree', () => {
    expect(isUnique(verdictFor(1, [firstRow], () => true))).toBe(true);
    expect(isUnique(verdictFor(2, [firstRow, secondRow], () => true))).toBe(false);
    expect(verdictFor(0, [], () => true)).toEqual({ kind: 'no-match', matchCount: 0 });
  });
});
