import type { GenerationResult } from "@shared/schema";
import { classifyEmotion, classifyLanguage } from "./classifiers";
import type { TextGenerator } from "./generationClient";
import { buildRewritePrompt, clampTargetLength, isWithinTolerance, textLength } from "./promptBuilder";

export const MAX_REWRITE_ATTEMPTS = 4;

export interface RewriteOptions {
  baseText: string;
  targetLength: number;
  targetEmotion?: string;
  targetLanguage?: string;
}

/**
 * Rewrite toward the target length, feeding each miss back into the next prompt.
 * Stops at the first attempt inside the tolerance window; after the last attempt
 * the most recent text is kept whatever its length. Transport errors propagate.
 */
export async function rewrite(generator: TextGenerator, options: RewriteOptions): Promise<GenerationResult> {
  const { baseText, targetEmotion, targetLanguage } = options;
  const targetLength = clampTargetLength(options.targetLength);

  let text = "";
  let previousLength: number | null = null;

  for (let attempt = 1; attempt <= MAX_REWRITE_ATTEMPTS; attempt++) {
    const prompt = buildRewritePrompt(baseText, targetLength, previousLength, targetEmotion, targetLanguage);
    text = (await generator.generate(prompt)).trim();
    const length = textLength(text);

    if (isWithinTolerance(length, targetLength)) {
      console.log(`[Rewrite] attempt ${attempt}: ${length}/${targetLength} chars, accepted`);
      break;
    }

    console.log(`[Rewrite] attempt ${attempt}: ${length}/${targetLength} chars, outside tolerance`);
    previousLength = length;
  }

  const emotion = await classifyEmotion(generator, text);
  const language = await classifyLanguage(generator, text);

  return { text, emotion, language };
}
