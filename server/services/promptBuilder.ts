import { EMOTIONS, LANGUAGES } from "@shared/vocabulary";

export const TOLERANCE_BELOW = 2;
export const TOLERANCE_ABOVE = 4;

export interface ToleranceWindow {
  min: number;
  max: number;
}

// Lengths are counted in code points, so an emoji or CJK character counts once.
export function textLength(text: string): number {
  return Array.from(text).length;
}

export function clampTargetLength(targetLength: number): number {
  return Math.max(1, Math.floor(targetLength));
}

export function toleranceWindow(targetLength: number): ToleranceWindow {
  const target = clampTargetLength(targetLength);
  return { min: target - TOLERANCE_BELOW, max: target + TOLERANCE_ABOVE };
}

export function isWithinTolerance(length: number, targetLength: number): boolean {
  const { min, max } = toleranceWindow(targetLength);
  return length >= min && length <= max;
}

/**
 * Instruction for one rewrite attempt.
 *
 * When the previous attempt landed outside the tolerance window, a corrective
 * clause names its length and asks for a result inside the window, leaning long.
 */
export function buildRewritePrompt(
  baseText: string,
  targetLength: number,
  previousLength?: number | null,
  targetEmotion?: string,
  targetLanguage?: string,
): string {
  const target = clampTargetLength(targetLength);
  const { min, max } = toleranceWindow(target);

  const lines: string[] = [
    `Rewrite the text below so that it is about ${target} characters long (counting spaces and punctuation).`,
    `Keep the meaning, register and emotional intensity of the original.`,
    `Do not pad with filler, do not add emoji, and do not add commentary.`,
  ];

  if (typeof previousLength === "number" && (previousLength < min || previousLength > max)) {
    lines.push(
      `Your previous attempt was ${previousLength} characters, which is outside the accepted range. ` +
        `Aim for between ${min} and ${max} characters. If you cannot hit the range exactly, ` +
        `make the result slightly longer rather than shorter.`,
    );
  }

  if (targetEmotion) {
    lines.push(`Make the dominant emotion of the rewritten text clearly ${targetEmotion}, amplifying it where the wording allows.`);
  }

  if (targetLanguage) {
    lines.push(`Write the rewritten text in ${targetLanguage}.`);
  }

  lines.push(`Return only the rewritten text.`, ``, `Text:`, baseText);
  return lines.join("\n");
}

function buildChoicePrompt(kind: string, options: readonly string[], text: string): string {
  return [
    `Identify the dominant ${kind} of the text below.`,
    `Answer with exactly one option from this list and nothing else:`,
    options.join(", "),
    ``,
    `Text:`,
    text,
  ].join("\n");
}

export function buildEmotionPrompt(text: string): string {
  return buildChoicePrompt("emotion", EMOTIONS, text);
}

export function buildLanguagePrompt(text: string): string {
  return buildChoicePrompt("language", LANGUAGES, text);
}
