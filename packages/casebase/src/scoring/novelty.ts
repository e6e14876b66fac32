/**
 * Novelty Heuristics
 *
 * A novelty heuristic scores how new a solution is, in [0, 1]. The payload
 * is opaque, so the default only looks for explicit markers left by the
 * caller.
 */

/**
 * Scores the novelty of a solution payload
 */
export type NoveltyHeuristic = (solutionPayload: string) => number;

/**
 * Phrases that mark a solution as novel
 */
export const NOVELTY_MARKERS: readonly string[] = ['[novel]', 'novel', 'new approach', 'first time'];

const DEFAULT_NOVELTY = 0.5;
const MARKED_NOVELTY = 1.0;

/**
 * Same novelty for every payload
 */
export function constantNovelty(value: number = DEFAULT_NOVELTY): NoveltyHeuristic {
  const clamped = Math.min(1, Math.max(0, value));
  return () => clamped;
}

/**
 * 1.0 for payloads carrying a novelty marker, 0.5 otherwise
 */
export const markedNovelty: NoveltyHeuristic = (solutionPayload) => {
  const lower = solutionPayload.toLowerCase();
  return NOVELTY_MARKERS.some((marker) => lower.includes(marker)) ? MARKED_NOVELTY : DEFAULT_NOVELTY;
};
