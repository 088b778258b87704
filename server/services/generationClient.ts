import { geminiResponseSchema } from "@shared/schema";
import { TransportError, errorMessage } from "../lib/errors";

export interface TextGenerator {
  /** Single-turn prompt in, first candidate text out. Throws TransportError on transport or status failure. */
  generate(prompt: string): Promise<string>;
}

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

export const DEFAULT_GEMINI_TIMEOUT_MS = 20_000;

export class GeminiClient implements TextGenerator {
  constructor(private readonly options: GeminiClientOptions) {}

  get endpoint(): string {
    const base = this.options.baseUrl.replace(/\/+$/, "");
    return `${base}/models/${encodeURIComponent(this.options.model)}:generateContent`;
  }

  async generate(prompt: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.options.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: "user", parts: [{ text: prompt }] }],
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Gemini request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    let raw: string;
    try {
      raw = await response.text();
    } catch (error) {
      throw new TransportError(`Gemini response could not be read: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      console.error(`[Gemini] ${response.status} from ${this.options.model}`);
      throw new TransportError(`Gemini API ${response.status}: ${raw.slice(0, 500)}`, response.status);
    }

    return extractCandidateText(raw);
  }
}

// First candidate's first text part, or "" when the reply has another shape.
export function extractCandidateText(raw: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return "";
  }
  const parsed = geminiResponseSchema.safeParse(payload);
  if (!parsed.success) return "";
  return parsed.data.candidates[0].content.parts[0].text;
}
