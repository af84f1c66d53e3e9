import { createServer, type IncomingMessage } from "node:http";
import { createApp } from "./app";
import { loadEnvironment, readConfig } from "./config/app-config";
import { InferenceEngine } from "./services/inference-service";
import {
  LiveAirQualityService,
  maskApiKey,
} from "./services/live-air-quality-service";

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function startServer() {
  loadEnvironment();
  const config = readConfig();

  console.log("Environment loaded:", {
    PORT: config.port,
    API_KEY: config.openWeatherApiKey
      ? maskApiKey(config.openWeatherApiKey)
      : "NOT SET",
    MODEL_DIR: config.modelDir,
  });

  // Model artifacts are read once here and shared read-only by every request
  const engine = InferenceEngine.fromDirectory(config.modelDir);
  const liveService = new LiveAirQualityService({
    engine,
    location: config.liveLocation,
    apiKey: config.openWeatherApiKey,
    baseUrl: config.openWeatherBaseUrl,
  });
  const app = createApp({
    engine,
    liveService,
    allowedOrigins: config.allowedOrigins,
  });

  // Bridge Node's req/res to the Fetch API Request/Response Hono expects
  const server = createServer(async (req, res) => {
    try {
      const url = new URL(req.url || "/", `http://${req.headers.host || "localhost"}`);
      const method = req.method || "GET";
      const headers = new Headers();

      Object.entries(req.headers).forEach(([key, value]) => {
        if (value) headers.set(key, Array.isArray(value) ? value.join(", ") : value);
      });

      const requestInit: RequestInit = { method, headers };
      if (!["GET", "HEAD"].includes(method)) {
        requestInit.body = await readBody(req);
      }

      const response = await app.fetch(new Request(url.toString(), requestInit));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        res.setHeader(key, value);
      });
      res.end(await response.text());
    } catch (error) {
      console.error("Server error:", error);

      res.statusCode = 500;
      res.setHeader("Content-Type", "application/json");
      res.end(JSON.stringify({ success: false, error: "Internal Server Error" }));
    }
  });

  server.listen(config.port, () => {
    console.log(`🚀 Server is running on http://localhost:${config.port}`);
  });

  return server;
}

// Only start the server if this file is executed directly
if (require.main === module) {
  startServer();
}
