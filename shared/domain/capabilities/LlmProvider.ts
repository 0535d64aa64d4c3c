export interface LlmProvider {
  /**
   * Generate a completion for prompt.
   * @throws LlmError when the model server fails or is unreachable
   */
  generate(prompt: string): Promise<string>;

  healthCheck(): Promise<boolean>;
}
