/**
 * Text-completion oracle (a hosted language model).
 * Stateless per call; no streaming.
 */
export interface ICompletionOracle {
  /**
   * Complete a prompt.
   * @returns The model's raw text output
   */
  complete(prompt: string): Promise<string>;
}
