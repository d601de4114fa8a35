/**
 * Response Generator Port
 *
 * Turns assembled context plus a query into raw response text.
 */

export interface GenerateOptions {
  /** Extra instruction for a regeneration, e.g. why the last candidate was rejected */
  guidance?: string;
  /** Replaces the default system prompt */
  systemPrompt?: string;
}

export interface IResponseGenerator {
  /**
   * Produce response text.
   * @throws GenerationFailure on timeout, exhaustion or an unusable reply
   */
  generate(context: string, query: string, options?: GenerateOptions): Promise<string>;
}
