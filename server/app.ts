import express, { type Express } from "express";
import { corsHeaders, registerRoutes } from "./routes";
import type { TextGenerator } from "./services/generationClient";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${formattedTime} [${source}] ${message}`);
}

export function createApp(generator: TextGenerator): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(corsHeaders);
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/generate")) {
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });
    next();
  });

  // Parse every POST body as JSON whatever its Content-Type; an empty body becomes {}.
  app.use(express.json({ type: () => true, limit: "1mb" }));

  return registerRoutes(app, generator);
}
