/**
 * Naming convention used when an entity or field declares no explicit name:
 * an underscore goes between a lower-case letter and the run of upper-case
 * letters after it, then everything is lower-cased.
 *
 * @example
 * ```typescript
 * toSnakeCase('createdAt');  // 'created_at'
 * toSnakeCase('OrderLine');  // 'order_line'
 * toSnakeCase('customerID'); // 'customer_id'
 * ```
 */
export function toSnakeCase(name: string): string {
  return name.replaceAll(/([a-z])([A-Z]+)/g, '$1_$2').toLowerCase();
}
