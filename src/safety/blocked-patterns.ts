/**
 * Case-insensitive blocked patterns, compiled once at startup.
 */

import { FatalStartupFailure } from '../core/errors.js';

export class BlockedPatterns {
  private readonly patterns: RegExp[];

  /**
   * @param component Named in the startup failure when a pattern is invalid
   */
  constructor(sources: readonly string[], component: string) {
    this.patterns = sources.map((source) => {
      try {
        return new RegExp(source, 'i');
      } catch (error) {
        throw new FatalStartupFailure(
          component,
          `invalid blocked pattern "${source}": ` +
            (error instanceof Error ? error.message : String(error)),
          { cause: error }
        );
      }
    });
  }

  /**
   * @returns Source of the first matching pattern, or null
   */
  match(text: string): string | null {
    for (const pattern of this.patterns) {
      if (pattern.test(text)) return pattern.source;
    }
    return null;
  }
}
