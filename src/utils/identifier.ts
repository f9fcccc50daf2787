/**
 * SQL Identifier Utilities
 *
 * Shared utilities for handling SQL identifiers (database/table names)
 * consistently across the codebase.
 */

/**
 * Remove surrounding quotes from an identifier
 *
 * Handles double quotes, single quotes and MySQL backticks.
 *
 * @example
 * stripQuotes('"users"') // => 'users'
 * stripQuotes('`sales`') // => 'sales'
 * stripQuotes('users') // => 'users'
 */
export function stripQuotes(identifier: string): string {
  return identifier.replace(/^["'`]|["'`]$/g, '');
}

/**
 * Take the last segment of a qualified name
 *
 * @example
 * unqualify('sales.orders') // => 'orders'
 * unqualify('`sales`.`orders`') // => 'orders'
 */
export function unqualify(name: string): string {
  const segments = name.split('.');
  return stripQuotes(segments[segments.length - 1] ?? name);
}

/**
 * Compare two identifiers case-insensitively, ignoring quotes
 */
export function identifiersEqual(a: string, b: string): boolean {
  return stripQuotes(a).toLowerCase() === stripQuotes(b).toLowerCase();
}
