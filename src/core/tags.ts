import type { JsonObject } from "./logger.js";

export const SCORE_TAGS = ["coherence", "style", "general"] as const;

export type ScoreTag = (typeof SCORE_TAGS)[number];

export type Critique = {
  analysis: string | null;
  scores: Record<ScoreTag, number | null>;
  missing_tags: ScoreTag[];
};

/** Content of the first `<tag>...</tag>` pair, trimmed. Case-insensitive, spans lines. */
export function extractTag(text: string, tag: string): string | null {
  const pattern = new RegExp(`<${escapeRegExp(tag)}>([\\s\\S]*?)</${escapeRegExp(tag)}>`, "i");
  const match = pattern.exec(text);
  if (!match) return null;
  return match[1].trim();
}

/** First decimal number inside the tag, so "<style>7/10</style>" reads as 7. */
export function extractScore(text: string, tag: string): number | null {
  const content = extractTag(text, tag);
  if (content === null) return null;

  const match = /(\d+(?:\.\d+)?)/.exec(content);
  if (!match) return null;
  return Number.parseFloat(match[1]);
}

export function parseCritique(text: string): Critique {
  const scores: Record<ScoreTag, number | null> = { coherence: null, style: null, general: null };
  const missing: ScoreTag[] = [];

  for (const tag of SCORE_TAGS) {
    const score = extractScore(text, tag);
    scores[tag] = score;
    if (score === null) missing.push(tag);
  }

  return { analysis: extractTag(text, "analysis"), scores, missing_tags: missing };
}

/** A stored critique counts only when every score was extracted. */
export function hasAllScores(value: JsonObject): boolean {
  const scores = value.scores;
  if (!scores || typeof scores !== "object" || Array.isArray(scores)) return false;

  return SCORE_TAGS.every((tag) => typeof scores[tag] === "number");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
