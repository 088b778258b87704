import { describe, expect, it } from "vitest";
import { EMOTIONS, LANGUAGES } from "@shared/vocabulary";
import {
  buildEmotionPrompt,
  buildLanguagePrompt,
  buildRewritePrompt,
  isWithinTolerance,
  textLength,
  toleranceWindow,
} from "./promptBuilder";

const FEEDBACK = "Your previous attempt was";

describe("tolerance window", () => {
  it("spans two below to four above the target", () => {
    expect(toleranceWindow(10)).toEqual({ min: 8, max: 14 });
  });

  it("clamps the target to at least one", () => {
    expect(toleranceWindow(0)).toEqual({ min: -1, max: 5 });
    expect(toleranceWindow(-20)).toEqual({ min: -1, max: 5 });
  });

  it("is inclusive at both edges", () => {
    expect(isWithinTolerance(7, 10)).toBe(false);
    expect(isWithinTolerance(8, 10)).toBe(true);
    expect(isWithinTolerance(14, 10)).toBe(true);
    expect(isWithinTolerance(15, 10)).toBe(false);
  });
});

describe("textLength", () => {
  it("counts code points rather than UTF-16 units", () => {
    expect(textLength("héllo😀")).toBe(6);
    expect(textLength("")).toBe(0);
  });
});

describe("buildRewritePrompt", () => {
  it("asks for the target length and ends with the text", () => {
    const prompt = buildRewritePrompt("The cat sat.", 20);
    expect(prompt).toContain("about 20 characters long");
    expect(prompt).toContain("do not add emoji");
    expect(prompt.endsWith("Return only the rewritten text.\n\nText:\nThe cat sat.")).toBe(true);
  });

  it("uses 1 as the target when given zero", () => {
    expect(buildRewritePrompt("x", 0)).toContain("about 1 characters long");
  });

  it("adds no feedback on the first attempt", () => {
    expect(buildRewritePrompt("abc", 10)).not.toContain(FEEDBACK);
    expect(buildRewritePrompt("abc", 10, null)).not.toContain(FEEDBACK);
  });

  it("adds no feedback when the previous length was inside the window", () => {
    expect(buildRewritePrompt("abc", 10, 8)).not.toContain(FEEDBACK);
    expect(buildRewritePrompt("abc", 10, 14)).not.toContain(FEEDBACK);
  });

  it("adds feedback naming the miss and the window when the previous length was outside it", () => {
    const short = buildRewritePrompt("abc", 10, 7);
    expect(short).toContain("Your previous attempt was 7 characters");
    expect(short).toContain("between 8 and 14 characters");
    expect(short).toContain("slightly longer rather than shorter");

    expect(buildRewritePrompt("abc", 10, 15)).toContain("Your previous attempt was 15 characters");
  });

  it("adds emotion and language clauses only when asked", () => {
    const plain = buildRewritePrompt("abc", 10);
    expect(plain).not.toContain("dominant emotion");
    expect(plain).not.toContain("Write the rewritten text in");

    const styled = buildRewritePrompt("abc", 10, null, "Joy", "French");
    expect(styled).toContain("clearly Joy");
    expect(styled).toContain("Write the rewritten text in French.");
  });

  it("is deterministic", () => {
    expect(buildRewritePrompt("abc", 10, 3, "Fear", "German")).toBe(buildRewritePrompt("abc", 10, 3, "Fear", "German"));
  });
});

describe("classification prompts", () => {
  it("lists every emotion and then the text", () => {
    const prompt = buildEmotionPrompt("I miss those summers.");
    expect(prompt).toContain(EMOTIONS.join(", "));
    expect(prompt.endsWith("Text:\nI miss those summers.")).toBe(true);
  });

  it("lists every language and then the text", () => {
    const prompt = buildLanguagePrompt("Bonjour");
    expect(prompt).toContain(LANGUAGES.join(", "));
    expect(prompt).toContain("dominant language");
    expect(prompt.endsWith("Text:\nBonjour")).toBe(true);
  });
});
