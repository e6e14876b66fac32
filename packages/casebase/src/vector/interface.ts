/**
 * Vector Index Interface
 *
 * The index holds exactly one vector per stored case. Writes are
 * synchronous so they run inside the case store's transaction and the two
 * memberships can never diverge; queries are asynchronous so remote or
 * approximate indexes can be plugged in behind a deadline.
 */

/**
 * One nearest-neighbour hit
 */
export interface VectorMatch {
  caseId: string;
  /** Cosine distance (1 - cosine similarity); lower is closer */
  distance: number;
}

/**
 * Vector index contract
 */
export interface IVectorIndex {
  /** Implementation name, reported in insights */
  readonly name: string;
  /** Vector dimensionality */
  readonly dimensions: number;

  /** Create backing structures */
  initialize(): void;
  /** Insert or replace the vector of a case */
  insert(caseId: string, vector: readonly number[]): void;
  /** Remove the vector of a case; no-op when absent */
  remove(caseId: string): void;
  /** The k nearest vectors, ascending by distance */
  query(vector: readonly number[], k: number): Promise<VectorMatch[]>;
  /** Whether a vector is stored for the case */
  has(caseId: string): boolean;
  /** Every indexed case id */
  ids(): string[];
  /** Number of indexed vectors */
  size(): number;
}
