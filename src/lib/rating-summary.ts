export interface RatingRecord {
  recipeTitle: string;
  rating: number;
}

export const LIKED_MIN_RATING = 4;
export const DISLIKED_MAX_RATING = 2;

/** Turns recent ratings into a line the model can use to steer suggestions. */
export function buildRatingSummary(ratings: RatingRecord[]): string {
  const liked = new Set<string>();
  const disliked = new Set<string>();

  for (const { recipeTitle, rating } of ratings) {
    const title = recipeTitle.trim();
    if (!title) continue;
    if (rating >= LIKED_MIN_RATING) liked.add(title);
    else if (rating <= DISLIKED_MAX_RATING) disliked.add(title);
  }

  const parts: string[] = [];
  if (liked.size) parts.push(`User liked: ${[...liked].join(", ")}.`);
  if (disliked.size) parts.push(`User disliked: ${[...disliked].join(", ")}.`);
  return parts.join(" ");
}
