/**
 * Capability tags
 *
 * A capability names an expression language that a factory can compile
 * and that a planner can request when deciding what to push down.
 */

/**
 * Known expression capabilities
 */
export const ExpressionCapability = {
  SQL: 'SQL'
} as const;

/**
 * A single capability tag. Tags are plain strings and compare with `===`.
 */
export type Capability = (typeof ExpressionCapability)[keyof typeof ExpressionCapability];
