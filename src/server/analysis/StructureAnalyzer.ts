// ============================================================================
// STRUCTURE ANALYZER
// ============================================================================
// Read-only summary of a document for HTML analysis reports.

import { HtmlDocument } from '../dom/HtmlDocument.js';
import type { ElementNode } from '../dom/HtmlDocument.js';

export interface IdentifiedElement {
  tag: string;
  index: number;
  id?: string;
  name?: string;
  class?: string;
}

export interface InteractiveElement {
  tag: string;
  index: number;
  text: string;
  id?: string;
  name?: string;
  type?: string;
  href?: string;
}

export interface DocumentSummary {
  totalElements: number;
  /** Tag → count, keys sorted */
  tagCounts: Record<string, number>;
  /** Depth of the deepest element, the root element being 1 */
  maxDepth: number;
  /** Elements carrying a non-empty id, name or class */
  identifiedElements: IdentifiedElement[];
  interactiveElements: InteractiveElement[];
}

const INTERACTIVE_TAGS = new Set(['button', 'input', 'a', 'select', 'textarea']);

export function isInteractive(element: ElementNode): boolean {
  if (!INTERACTIVE_TAGS.has(element.tag)) return false;
  return !(element.tag === 'input' && element.attributes.get('type')?.toLowerCase() === 'hidden');
}

function nonEmpty(element: ElementNode, attribute: string): string | undefined {
  const value = element.attributes.get(attribute);
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Copy only the attributes that are present, so absent keys stay absent
 */
function pick<K extends string>(element: ElementNode, attributes: readonly K[]): Partial<Record<K, string>> {
  const picked: Partial<Record<K, string>> = {};
  for (const attribute of attributes) {
    const value = nonEmpty(element, attribute);
    if (value !== undefined) picked[attribute] = value;
  }
  return picked;
}

export function summarizeDocument(document: HtmlDocument): DocumentSummary {
  const counts = new Map<string, number>();
  let maxDepth = 0;
  const identifiedElements: IdentifiedElement[] = [];
  const interactiveElements: InteractiveElement[] = [];

  for (const element of document.elements) {
    counts.set(element.tag, (counts.get(element.tag) ?? 0) + 1);
    maxDepth = Math.max(maxDepth, element.depth);

    const identity = pick(element, ['id', 'name', 'class'] as const);
    if (Object.keys(identity).length > 0) {
      identifiedElements.push({ tag: element.tag, index: element.index, ...identity });
    }

    if (isInteractive(element)) {
      interactiveElements.push({
        tag: element.tag,
        index: element.index,
        text: element.text,
        ...pick(element, ['id', 'name', 'type', 'href'] as const),
      });
    }
  }

  const tagCounts: Record<string, number> = {};
  for (const tag of [...counts.keys()].sort()) {
    tagCounts[tag] = counts.get(tag) ?? 0;
  }

  return {
    totalElements: document.elements.length,
    tagCounts,
    maxDepth,
    identifiedElements,
    interactiveElements,
  };
}

export function analyzeStructure(html: string): DocumentSummary {
  return summarizeDocument(HtmlDocument.parse(html));
}
