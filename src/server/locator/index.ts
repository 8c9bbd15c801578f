// ============================================================================
// LOCATOR ENGINE - public entry points
// ============================================================================

import { HtmlDocument } from '../dom/HtmlDocument.js';
import type { ElementNode } from '../dom/HtmlDocument.js';
import type { ResolutionResult, ResolveOptions } from '../types/locator-types.js';
import { ResolutionEngine } from './ResolutionEngine.js';

/**
 * Parse the HTML and resolve the element the description refers to.
 * Throws ParseError only for input without any element markup.
 */
export function resolveLocator(html: string, targetDescription: string, elementTypeHint?: string): ResolutionResult {
  return resolveInDocument(HtmlDocument.parse(html), targetDescription, { elementTypeHint });
}

export function resolveInDocument(
  document: HtmlDocument,
  description: string,
  options: ResolveOptions = {}
): ResolutionResult {
  return new ResolutionEngine(document, { kind: 'description', description, options }).run();
}

/**
 * Best unique locator for an element already known to the caller
 */
export function resolveElement(document: HtmlDocument, element: ElementNode): ResolutionResult {
  return new ResolutionEngine(document, { kind: 'element', element }).run();
}

export { analyzeStructure } from '../analysis/StructureAnalyzer.js';
export type { DocumentSummary } from '../analysis/StructureAnalyzer.js';
export { ResolutionEngine, ResolutionState } from './ResolutionEngine.js';
export { generateCandidates, classifyExpression } from './CandidateGenerator.js';
export { scoreCandidate, CONFIDENCE_BANDS } from './ConfidenceScorer.js';
export { verify, verifyExpression } from './UniquenessVerifier.js';
export { xpathLiteral } from './xpathLiteral.js';
