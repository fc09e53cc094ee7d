/**
 * Embedding provider contract.
 *
 * Dependency direction: embeddings/types.ts → nothing (leaf module)
 * Used by: embedding adapters, knowledge base, context provider
 */

export type EmbeddingProviderName = 'ollama' | 'openai';

export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  /** Model id recorded in the index manifest. */
  readonly model: string;

  /**
   * Embed each text. The result has one vector per input, in input order.
   * @throws {ProviderError} on API failure or a count mismatch.
   */
  embed(texts: readonly string[]): Promise<number[][]>;

  /** Returns true when the embedding endpoint is reachable. Should NOT throw. */
  validateConnection(): Promise<boolean>;
}
