export interface EmbeddingProvider {
  /**
   * Embed text into a fixed-dimension vector.
   * @throws EmbeddingError when the model cannot be loaded or run
   */
  embed(text: string): Promise<number[]>;
}
