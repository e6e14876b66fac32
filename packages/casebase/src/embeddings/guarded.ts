/**
 * Deadline-bounded Embedding
 */

import { DeadlineExceededError, EmbeddingFailedError, type ErrorContext } from '../errors.js';
import type { Deadline } from '../utils/deadline.js';
import { assertVector } from '../utils/vector.js';
import type { IEmbeddingProvider } from './interface.js';

/**
 * Embed `text` within the deadline and check the vector against the store's
 * dimensionality. Provider failures surface as EmbeddingFailedError.
 */
export async function embedWithin(
  embedder: IEmbeddingProvider,
  text: string,
  dimensions: number,
  deadline: Deadline,
  context: ErrorContext
): Promise<number[]> {
  let vector: number[];
  try {
    vector = await deadline.race(() => embedder.embed(text), context);
  } catch (err) {
    if (err instanceof DeadlineExceededError) throw err;
    throw new EmbeddingFailedError(embedder.name, err, context);
  }

  assertVector(vector, dimensions, context);
  return vector;
}
