/**
 * Embedding Provider Interface
 *
 * Defines the contract for embedding providers. The case memory only
 * consumes vectors; how they are produced is up to the provider.
 */

export interface IEmbeddingProvider {
  /** Short identifier used in logs and error messages */
  readonly name: string;
  /** Length of every vector this provider returns */
  readonly dimensions: number;

  /** Fail fast when the provider cannot serve requests */
  initialize(): Promise<void>;
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
  /** Cheap reachability check used by auto-detection */
  isAvailable(): Promise<boolean>;
}
