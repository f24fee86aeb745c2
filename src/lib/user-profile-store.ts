import { getDb } from "./firebase";
import { buildRatingSummary, type RatingRecord } from "./rating-summary";

const RATING_HISTORY_LIMIT = 20;

export async function getSpicesForUser(uid: string): Promise<string[]> {
  const doc = await getDb().collection("users").doc(uid).get();
  if (!doc.exists) return [];

  const spices: unknown = doc.get("spices");
  if (!Array.isArray(spices)) return [];
  return spices.filter((s): s is string => typeof s === "string" && s.trim() !== "");
}

function toRatingRecord(data: Record<string, unknown>): RatingRecord | null {
  if (typeof data.recipeTitle !== "string" || typeof data.rating !== "number") return null;
  return { recipeTitle: data.recipeTitle, rating: data.rating };
}

function createdAtOf(data: Record<string, unknown>): string {
  return typeof data.createdAt === "string" ? data.createdAt : "";
}

async function loadRecentRatings(uid: string): Promise<RatingRecord[]> {
  const ratings = getDb().collection("ratings").where("userId", "==", uid);

  try {
    const snapshot = await ratings.orderBy("createdAt", "desc").limit(RATING_HISTORY_LIMIT).get();
    return snapshot.docs
      .map((doc) => toRatingRecord(doc.data()))
      .filter((r): r is RatingRecord => r !== null);
  } catch (error) {
    // Missing composite index — sort a plain scan in memory
    console.error(
      "[user-profile-store] ordered ratings query failed, scanning instead:",
      error instanceof Error ? error.message : String(error)
    );
  }

  const fallback = await ratings.limit(RATING_HISTORY_LIMIT * 5).get();
  return fallback.docs
    .map((doc) => doc.data())
    .sort((a, b) => createdAtOf(b).localeCompare(createdAtOf(a)))
    .slice(0, RATING_HISTORY_LIMIT)
    .map(toRatingRecord)
    .filter((r): r is RatingRecord => r !== null);
}

/** Rating history is only a prompt hint; a failed lookup yields "". */
export async function summarizeRatingsForPrompt(uid: string): Promise<string> {
  try {
    return buildRatingSummary(await loadRecentRatings(uid));
  } catch (error) {
    console.error(
      "[user-profile-store] rating lookup failed:",
      error instanceof Error ? error.message : String(error)
    );
    return "";
  }
}
