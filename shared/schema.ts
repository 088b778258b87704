import { z } from "zod";

// Inbound body for POST /generate. Every field falls back instead of failing,
// so the only rejections are the ones the route makes explicitly.
export const generateRequestSchema = z.object({
  baseText: z.string().catch(""),
  targetLength: z.coerce.number().finite().catch(0),
  targetEmotion: z.string().optional().catch(undefined),
  targetLanguage: z.string().optional().catch(undefined),
  analysisOnly: z.coerce.boolean().catch(false),
});

export type GenerateRequestBody = z.infer<typeof generateRequestSchema>;

export interface GenerationRequest {
  baseText: string;
  targetLength: number;
  targetEmotion?: string;
  targetLanguage?: string;
  analysisOnly: boolean;
}

export interface GenerationResult {
  text: string;
  emotion: string;
  language: string;
}

export interface GenerateErrorBody {
  text: string;
  error: string;
}

export type GenerateResponseBody = GenerationResult | GenerateErrorBody;

// Shape of a Gemini generateContent reply; only the parts we read.
const geminiPartSchema = z.object({ text: z.string() }).passthrough();

const geminiCandidateSchema = z
  .object({
    content: z.object({ parts: z.array(geminiPartSchema).min(1) }).passthrough(),
  })
  .passthrough();

export const geminiResponseSchema = z
  .object({ candidates: z.array(geminiCandidateSchema).min(1) })
  .passthrough();

export type GeminiResponse = z.infer<typeof geminiResponseSchema>;
