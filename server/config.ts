import * as dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_GEMINI_TIMEOUT_MS } from "./services/generationClient";

dotenv.config({ override: false });

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing env: ${name}`);
  return v.trim();
}

const envSchema = z.object({
  GEMINI_MODEL: z.string().min(1).default("gemini-1.5-flash"),
  GEMINI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_GEMINI_TIMEOUT_MS),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
});

export interface AppConfig {
  geminiApiKey: string;
  geminiModel: string;
  geminiBaseUrl: string;
  geminiTimeoutMs: number;
  port: number;
  host: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const geminiApiKey = requireEnv("GEMINI_API_KEY", env);
  const parsed = envSchema.parse(env);
  return {
    geminiApiKey,
    geminiModel: parsed.GEMINI_MODEL,
    geminiBaseUrl: parsed.GEMINI_BASE_URL,
    geminiTimeoutMs: parsed.GEMINI_TIMEOUT_MS,
    port: parsed.PORT,
    host: parsed.HOST,
  };
}
