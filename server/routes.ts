import type { Express, NextFunction, Request, Response } from "express";
import {
  generateRequestSchema,
  type GenerateResponseBody,
  type GenerationRequest,
} from "@shared/schema";
import { normalizeEmotion, normalizeLanguage } from "@shared/vocabulary";
import { TransportError, ValidationError, errorMessage } from "./lib/errors";
import { classifyEmotion, classifyLanguage } from "./services/classifiers";
import type { TextGenerator } from "./services/generationClient";
import { textLength } from "./services/promptBuilder";
import { rewrite } from "./services/rewriteController";

export const CORS_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "POST, OPTIONS",
  "Access-Control-Max-Age": "86400",
});

export function corsHeaders(_req: Request, res: Response, next: NextFunction) {
  res.set(CORS_HEADERS);
  next();
}

// A missing or non-positive target means "keep the current length".
export function resolveTargetLength(baseText: string, targetLength: number): number {
  const requested = Math.floor(targetLength);
  return requested > 0 ? requested : textLength(baseText);
}

export function parseGenerationRequest(body: unknown): GenerationRequest {
  const parsed = generateRequestSchema.safeParse(body);
  const data = parsed.success ? parsed.data : generateRequestSchema.parse({});

  if (!data.baseText.trim()) {
    throw new ValidationError("missing_base_text");
  }

  const targetEmotion = normalizeEmotion(data.targetEmotion);
  if (data.targetEmotion && !targetEmotion) {
    console.warn(`[Generate] ignoring unknown targetEmotion "${data.targetEmotion}"`);
  }
  const targetLanguage = normalizeLanguage(data.targetLanguage);
  if (data.targetLanguage && !targetLanguage) {
    console.warn(`[Generate] ignoring unknown targetLanguage "${data.targetLanguage}"`);
  }

  return {
    baseText: data.baseText,
    targetLength: resolveTargetLength(data.baseText, data.targetLength),
    targetEmotion,
    targetLanguage,
    analysisOnly: data.analysisOnly,
  };
}

interface BodyParserError {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function registerRoutes(app: Express, generator: TextGenerator): Express {
  app.options("/generate", (_req, res) => {
    res.status(204).end();
  });

  app.post("/generate", async (req: Request, res: Response<GenerateResponseBody>) => {
    let baseText = "";
    try {
      const request = parseGenerationRequest(req.body);
      baseText = request.baseText;

      if (request.analysisOnly) {
        console.log(`[Generate] analysis only, ${textLength(baseText)} chars`);
        const emotion = await classifyEmotion(generator, baseText);
        const language = await classifyLanguage(generator, baseText);
        return res.json({ text: baseText, emotion, language });
      }

      console.log(
        `[Generate] rewrite ${textLength(baseText)} -> ${request.targetLength} chars` +
          (request.targetEmotion ? `, emotion=${request.targetEmotion}` : "") +
          (request.targetLanguage ? `, language=${request.targetLanguage}` : ""),
      );
      const result = await rewrite(generator, request);
      return res.json(result);
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ text: "", error: error.code });
      }
      if (error instanceof TransportError) {
        console.error(`[Generate] upstream failure: ${error.message}`);
        return res.status(error.status ?? 502).json({ text: baseText, error: error.message });
      }
      console.error("[Generate] Error:", error);
      return res.status(500).json({ text: baseText, error: "internal_error" });
    }
  });

  app.all("/generate", (_req, res: Response<GenerateResponseBody>) => {
    res.set("Allow", "POST, OPTIONS").status(405).json({ text: "", error: "method_not_allowed" });
  });

  app.use((err: unknown, _req: Request, res: Response<GenerateResponseBody>, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (isBodyParserError(err)) {
      if (err.type === "entity.parse.failed") {
        return res.status(400).json({ text: "", error: "invalid_json_payload" });
      }
      return res.status(err.status).json({ text: "", error: err.type.replace(/\./g, "_") });
    }
    console.error("[Server] Unhandled error:", errorMessage(err));
    return res.status(500).json({ text: "", error: "internal_error" });
  });

  return app;
}
