/**
 * Environment accessor
 *
 * Abstracts process-wide environment lookups so credential resolution can be
 * exercised without touching real environment variables.
 */

export interface IEnvironment {
  /**
   * Looks up a variable by name.
   *
   * @returns The raw value (the empty string included), or undefined when the
   *          variable is not set at all
   */
  lookup(name: string): string | undefined;
}
