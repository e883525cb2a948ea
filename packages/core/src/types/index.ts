/**
 * Values that can be inlined into a predicate as a quoted literal.
 * Dates are rendered in the dialect's timestamp text format.
 */
export type LiteralValue = string | number | bigint | boolean | Date;

/**
 * Join flavours understood by the assembler.
 * @example
 * ```typescript
 * cb.declareJoin(Customer, root.column('customerId'), 'id', 'LEFT');
 * // LEFT OUTER JOIN customer j ON m.customer_id = j.id
 * ```
 */
export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';

/**
 * Wildcard placement for LIKE / NOT LIKE.
 * - ALL: `%value%`
 * - START: `value%` (starts with)
 * - END: `%value` (ends with)
 */
export type LikeMode = 'ALL' | 'START' | 'END';

export type OrderDirection = 'ASC' | 'DESC';

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
