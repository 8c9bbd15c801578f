// ============================================================================
// HTML DOCUMENT MODEL
// ============================================================================
// Parses raw HTML into an immutable tree of addressable elements and answers
// XPath queries against it. Tree building and XPath 1.0 evaluation are
// delegated to jsdom, whose HTML5 parser recovers from unclosed tags and
// unknown elements the way browsers do.

import { JSDOM } from 'jsdom';
import { InvalidExpressionError, ParseError, errorMessage } from '../types/errors.js';

export const HTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

// XPathResult constants
const STRING_TYPE = 2;
const ORDERED_NODE_SNAPSHOT_TYPE = 7;
const TEXT_NODE = 3;

/**
 * A parsed element. Fields are fixed once the document is built.
 */
export interface ElementNode {
  /** Local tag name, lowercase for HTML elements */
  readonly tag: string;
  readonly namespace: string | null;
  /** Attribute name → value, in source order */
  readonly attributes: ReadonlyMap<string, string>;
  /** Direct text content, whitespace collapsed and trimmed */
  readonly text: string;
  /** Raw data of each direct child text node */
  readonly textNodes: readonly string[];
  readonly children: readonly ElementNode[];
  /** Back-reference only; the document owns every node */
  readonly parent: ElementNode | null;
  /** 0-based document-order index */
  readonly index: number;
  /** 1 for the root element */
  readonly depth: number;
  /** 1-based position among same-tag siblings under the same parent */
  readonly siblingPosition: number;
  /** 1-based position among same-tag elements in document order */
  readonly documentPosition: number;
}

export interface XPathMatch {
  /** Number of nodes selected, elements or not */
  count: number;
  /** Selected elements in document order */
  elements: ElementNode[];
}

export type ElementPredicate = (element: ElementNode) => boolean;

interface BuildNode extends Omit<ElementNode, 'children'> {
  children: ElementNode[];
}

interface BuildFrame {
  element: Element;
  parent: BuildNode | null;
  depth: number;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function isHtmlElement(element: ElementNode): boolean {
  return element.namespace === HTML_NAMESPACE;
}

export class HtmlDocument {
  private constructor(
    private readonly dom: JSDOM,
    readonly root: ElementNode,
    readonly elements: readonly ElementNode[],
    private readonly nodes: ReadonlyMap<Node, ElementNode>
  ) {}

  /**
   * Build a document from HTML. Only input with no element markup at all is
   * rejected; everything else goes through the error-tolerant tree builder.
   */
  static parse(html: string): HtmlDocument {
    if (html.trim().length === 0) {
      throw new ParseError('HTML input is empty');
    }
    if (!/<[a-zA-Z]/.test(html)) {
      throw new ParseError('HTML input contains no element markup');
    }

    let dom: JSDOM;
    try {
      dom = new JSDOM(html);
    } catch (error) {
      throw new ParseError(`HTML could not be parsed: ${errorMessage(error)}`, { cause: error });
    }

    const elements: BuildNode[] = [];
    const nodes = new Map<Node, ElementNode>();
    const tagCounters = new Map<string, number>();

    const stack: BuildFrame[] = [{ element: dom.window.document.documentElement, parent: null, depth: 1 }];

    // Pre-order walk so that index follows document order
    for (let frame = stack.pop(); frame; frame = stack.pop()) {
      const { element, parent, depth } = frame;
      const tagKey = `${element.namespaceURI ?? ''} ${element.localName}`;
      const documentPosition = (tagCounters.get(tagKey) ?? 0) + 1;
      tagCounters.set(tagKey, documentPosition);

      const textNodes: string[] = [];
      for (const child of Array.from(element.childNodes)) {
        if (child.nodeType === TEXT_NODE) {
          textNodes.push(child.textContent ?? '');
        }
      }

      const attributes = new Map<string, string>();
      for (const attr of Array.from(element.attributes)) {
        attributes.set(attr.name, attr.value);
      }

      const node: BuildNode = {
        tag: element.localName,
        namespace: element.namespaceURI,
        attributes,
        text: normalizeWhitespace(textNodes.join('')),
        textNodes,
        children: [],
        parent,
        index: elements.length,
        depth,
        siblingPosition: siblingPosition(element),
        documentPosition,
      };

      parent?.children.push(node);
      elements.push(node);
      nodes.set(element, node);

      const children = Array.from(element.children);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ element: children[i], parent: node, depth: depth + 1 });
      }
    }

    return new HtmlDocument(dom, elements[0], elements, nodes);
  }

  /**
   * Elements satisfying the predicate, in document order
   */
  findElements(predicate: ElementPredicate): ElementNode[] {
    return this.elements.filter(predicate);
  }

  /**
   * Evaluate an XPath expression and return the selected elements.
   * Throws InvalidExpressionError when the expression is malformed or does
   * not evaluate to a node-set.
   */
  evaluate(expression: string): XPathMatch {
    if (expression.trim().length === 0) {
      throw new InvalidExpressionError(expression, 'expression is empty');
    }

    const document = this.dom.window.document;
    let result: XPathResult;
    try {
      result = document.evaluate(expression, document, null, ORDERED_NODE_SNAPSHOT_TYPE, null);
    } catch (error) {
      throw new InvalidExpressionError(expression, errorMessage(error), { cause: error });
    }

    const elements: ElementNode[] = [];
    for (let i = 0; i < result.snapshotLength; i++) {
      const item = result.snapshotItem(i);
      const element = item ? this.nodes.get(item) : undefined;
      if (element) {
        elements.push(element);
      }
    }

    return { count: result.snapshotLength, elements };
  }

  countMatches(expression: string): number {
    return this.evaluate(expression).count;
  }

  /**
   * Evaluate an expression as an XPath string value
   */
  stringValue(expression: string): string {
    const document = this.dom.window.document;
    try {
      return document.evaluate(expression, document, null, STRING_TYPE, null).stringValue;
    } catch (error) {
      throw new InvalidExpressionError(expression, errorMessage(error), { cause: error });
    }
  }
}

function siblingPosition(element: Element): number {
  let position = 1;
  for (let sibling = element.previousElementSibling; sibling; sibling = sibling.previousElementSibling) {
    if (sibling.localName === element.localName && sibling.namespaceURI === element.namespaceURI) {
      position++;
    }
  }
  return position;
}

// ----------------------------------------------------------------------------
// Predicate helpers
// ----------------------------------------------------------------------------

export function byTag(...tags: string[]): ElementPredicate {
  const wanted = new Set(tags.map((t) => t.toLowerCase()));
  return (element) => wanted.has(element.tag.toLowerCase());
}

/**
 * Attribute present, or equal to value when one is given
 */
export function byAttribute(name: string, value?: string): ElementPredicate {
  return (element) => {
    const actual = element.attributes.get(name);
    if (actual === undefined) return false;
    return value === undefined || actual === value;
  };
}

/**
 * Case-insensitive substring match against direct text
 */
export function byText(substring: string): ElementPredicate {
  const needle = substring.toLowerCase();
  return (element) => element.text.toLowerCase().includes(needle);
}
