// ============================================================================
// XPATH LITERALS
// ============================================================================
// XPath 1.0 has no escape sequences inside string literals, so a value is
// wrapped in whichever quote it does not contain, or split with concat().

export function xpathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }
  const parts = value.split("'").map((part) => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}

/**
 * Replace quoted literals with empty ones so that structural checks
 * (predicate counting, keyword search) ignore their content
 */
export function stripLiterals(expression: string): string {
  return expression.replace(/'[^']*'|"[^"]*"/g, (literal) => literal[0] + literal[0]);
}

/**
 * Unquoted values of every string literal, in order
 */
export function literalValues(expression: string): string[] {
  return Array.from(expression.matchAll(/'([^']*)'|"([^"]*)"/g), (m) => m[1] ?? m[2] ?? '');
}

/**
 * Same result as XPath normalize-space(), which only knows XML whitespace
 */
export function normalizeSpace(value: string): string {
  return value.replace(/[\t\n\r ]+/g, ' ').replace(/^ | $/g, '');
}
