/**
 * A read-only view of process environment variables.
 */
export interface Environment {
  /**
   * A copy of the variables at call time. Unset variables are absent, never
   * `undefined`.
   */
  snapshot(): Record<string, string>
}
