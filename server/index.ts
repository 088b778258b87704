import { createApp, log } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { errorMessage } from "./lib/errors";
import { GeminiClient } from "./services/generationClient";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`[Server] Fatal configuration error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

const config = readConfig();

const generator = new GeminiClient({
  apiKey: config.geminiApiKey,
  model: config.geminiModel,
  baseUrl: config.geminiBaseUrl,
  timeoutMs: config.geminiTimeoutMs,
});

createApp(generator).listen(config.port, config.host, () => {
  log(`serving on ${config.host}:${config.port} (model ${config.geminiModel})`);
});
