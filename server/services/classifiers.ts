import {
  EMOTION_LOOKUP,
  LANGUAGE_LOOKUP,
  NEUTRAL_EMOTION,
  UNKNOWN_LANGUAGE,
  type Vocabulary,
} from "@shared/vocabulary";
import { TransportError } from "../lib/errors";
import type { TextGenerator } from "./generationClient";
import { buildEmotionPrompt, buildLanguagePrompt } from "./promptBuilder";

const EMOTION_TOKEN = /[a-z]+/g;
const LANGUAGE_TOKEN = /[a-z()]+/g;

/**
 * Map free model output onto a vocabulary entry.
 * Whole answer first, then the first token that is itself an entry.
 */
export function matchVocabulary(
  answer: string,
  vocabulary: Vocabulary,
  tokenPattern: RegExp,
  fallback: string,
): string {
  const cleaned = answer.trim().toLowerCase();
  if (!cleaned) return fallback;

  const exact = vocabulary.get(cleaned);
  if (exact) return exact;

  for (const token of cleaned.match(tokenPattern) ?? []) {
    const hit = vocabulary.get(token);
    if (hit) return hit;
  }
  return fallback;
}

async function classify(
  generator: TextGenerator,
  label: string,
  prompt: string,
  vocabulary: Vocabulary,
  tokenPattern: RegExp,
  fallback: string,
): Promise<string> {
  let answer: string;
  try {
    answer = await generator.generate(prompt);
  } catch (error) {
    if (error instanceof TransportError) {
      console.warn(`[Classifier] ${label} lookup failed, using ${fallback}: ${error.message}`);
      return fallback;
    }
    throw error;
  }
  return matchVocabulary(answer, vocabulary, tokenPattern, fallback);
}

export function classifyEmotion(generator: TextGenerator, text: string): Promise<string> {
  return classify(generator, "emotion", buildEmotionPrompt(text), EMOTION_LOOKUP, EMOTION_TOKEN, NEUTRAL_EMOTION);
}

export function classifyLanguage(generator: TextGenerator, text: string): Promise<string> {
  return classify(generator, "language", buildLanguagePrompt(text), LANGUAGE_LOOKUP, LANGUAGE_TOKEN, UNKNOWN_LANGUAGE);
}
