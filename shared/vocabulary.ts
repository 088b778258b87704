// Fixed vocabularies used both to prompt the model and to normalize its answers.

export const EMOTIONS = Object.freeze([
  "Joy",
  "Sadness",
  "Anger",
  "Fear",
  "Surprise",
  "Disgust",
  "Trust",
  "Anticipation",
  "Love",
  "Gratitude",
  "Pride",
  "Shame",
  "Guilt",
  "Envy",
  "Hope",
  "Relief",
  "Anxiety",
  "Boredom",
  "Confusion",
  "Excitement",
  "Contempt",
  "Nostalgia",
  "Calm",
] as const);

export const LANGUAGES = Object.freeze([
  "English",
  "Spanish",
  "French",
  "German",
  "Italian",
  "Portuguese",
  "Dutch",
  "Russian",
  "Polish",
  "Ukrainian",
  "Turkish",
  "Arabic",
  "Hebrew",
  "Hindi",
  "Bengali",
  "Chinese",
  "Japanese",
  "Korean",
  "Vietnamese",
  "Thai",
  "Indonesian",
  "Swedish",
  "Greek",
] as const);

export type Emotion = (typeof EMOTIONS)[number];
export type Language = (typeof LANGUAGES)[number];

export const NEUTRAL_EMOTION = "Neutral";
export const UNKNOWN_LANGUAGE = "Unknown";

export type Vocabulary = ReadonlyMap<string, string>;

function buildLookup(names: readonly string[]): Vocabulary {
  return new Map(names.map((name) => [name.toLowerCase(), name]));
}

export const EMOTION_LOOKUP: Vocabulary = buildLookup(EMOTIONS);
export const LANGUAGE_LOOKUP: Vocabulary = buildLookup(LANGUAGES);

/** Canonical emotion name for a user-supplied value, or undefined when it is not in the list. */
export function normalizeEmotion(value: string | undefined): string | undefined {
  if (!value) return undefined;
  return EMOTION_LOOKUP.get(value.trim().toLowerCase());
}

export function normalizeLanguage(value: string | undefined): string | undefined {
  if (!value) return undefined;
  return LANGUAGE_LOOKUP.get(value.trim().toLowerCase());
}
