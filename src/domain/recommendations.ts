import type { RecommendationFilters, RecommendationItem } from "./types.js";

const MIN_SCORE = 0.01;

/** Capitalises each run of letters and keeps separators: `board_game` → `Board_Game`. */
function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`);
}

function scoreForRank(rank: number): number {
  return Math.max(MIN_SCORE, Math.round((0.95 - (rank - 1) * 0.05) * 100) / 100);
}

export function generateRecommendations(
  itemType: string,
  count: number,
  filters: RecommendationFilters = {},
): RecommendationItem[] {
  const excluded = new Set(filters.exclude_item_ids ?? []);
  const minScore = filters.min_score ?? 0;
  const label = titleCase(itemType);
  const items: RecommendationItem[] = [];

  // Ranks past the score floor all tie at MIN_SCORE, so the walk is bounded.
  const maxRank = count + excluded.size;
  for (let rank = 1; rank <= maxRank && items.length < count; rank += 1) {
    const itemId = `${itemType}_${rank}`;
    const score = scoreForRank(rank);
    if (excluded.has(itemId) || score < minScore) {
      continue;
    }
    items.push({
      item_id: itemId,
      title: `Recommended ${label} ${rank}`,
      score,
      category: itemType,
      reason: "Based on your preferences and similar users",
    });
  }
  return items;
}
