import type { Passage } from "@/types/retrieval";

export type FusedPassage = {
  passage: Passage;
  score: number;
  denseScore: number;
  lexicalScore: number;
};

/**
 * Rank-position scores: the i-th of n passages gets 1 - i/n. Passages are
 * identified by text; a repeated text keeps its first position.
 */
export function normalizeByPosition(passages: readonly Passage[]): Map<string, { passage: Passage; score: number }> {
  const scores = new Map<string, { passage: Passage; score: number }>();
  const total = passages.length;

  passages.forEach((passage, index) => {
    if (!scores.has(passage.text)) {
      scores.set(passage.text, { passage, score: 1 - index / total });
    }
  });

  return scores;
}

export function clampVectorWeight(vectorWeight: number, fallback = 0.7): number {
  if (!Number.isFinite(vectorWeight)) {
    return fallback;
  }

  return Math.min(Math.max(vectorWeight, 0), 1);
}

/**
 * Weighted linear fusion of two best-first lists. Missing signals count as 0.
 * Ties keep discovery order: dense passages first, then lexical-only ones.
 */
export function fuseRankedLists(
  dense: readonly Passage[],
  lexical: readonly Passage[],
  vectorWeight: number,
): FusedPassage[] {
  const weight = clampVectorWeight(vectorWeight);
  const denseScores = normalizeByPosition(dense);
  const lexicalScores = normalizeByPosition(lexical);
  const order: Passage[] = [];

  for (const { passage } of denseScores.values()) {
    order.push(passage);
  }

  for (const [text, { passage }] of lexicalScores) {
    if (!denseScores.has(text)) {
      order.push(passage);
    }
  }

  return order
    .map((passage, index) => {
      const denseScore = denseScores.get(passage.text)?.score ?? 0;
      const lexicalScore = lexicalScores.get(passage.text)?.score ?? 0;

      return {
        index,
        fused: {
          passage,
          denseScore,
          lexicalScore,
          score: weight * denseScore + (1 - weight) * lexicalScore,
        },
      };
    })
    .sort((left, right) => right.fused.score - left.fused.score || left.index - right.index)
    .map((row) => row.fused);
}
