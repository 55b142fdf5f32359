/**
 * @fileoverview Interface for configuration access abstraction.
 *
 * Decouples {@link loadConfig} from where raw values come from
 * (environment variables in production, a map in tests).
 *
 * @module interfaces/IConfigProvider
 */

/**
 * Source of raw configuration strings.
 *
 * @example
 * ```typescript
 * const provider: IConfigProvider = new EnvConfigProvider(process.env);
 * const ttl = provider.getConfig('cache', 'ttlHours'); // '24' or undefined
 * ```
 */
export interface IConfigProvider {
  /**
   * Get the raw value for `section.key`, or `undefined` when unset.
   *
   * @param section - Configuration section (e.g. `scheduler`)
   * @param key - Configuration key within the section
   */
  getConfig(section: string, key: string): string | undefined;
}
