import { Hono } from "hono";
import { logger } from "hono/logger";
import { createCorsMiddleware } from "./middleware/cors-middleware";
import { createLiveAqiRoutes } from "./routes/live-aqi-routes";
import { createPredictionRoutes } from "./routes/prediction-routes";
import type { InferenceEngine } from "./services/inference-service";
import type { LiveAirQualityService } from "./services/live-air-quality-service";

export interface AppDependencies {
  engine: InferenceEngine;
  liveService: LiveAirQualityService;
  allowedOrigins: readonly string[];
  requestLogging?: boolean;
}

export function createApp({
  engine,
  liveService,
  allowedOrigins,
  requestLogging = true,
}: AppDependencies) {
  const app = new Hono();

  app.use("*", createCorsMiddleware(allowedOrigins));
  if (requestLogging) {
    app.use(logger());
  }

  app.route("/", createPredictionRoutes(engine));
  app.route("/", createLiveAqiRoutes(liveService));

  // Default route
  app.get("/", (c) => {
    const place = liveService.location.name ?? "the configured location";
    return c.json({
      message: "AQI classification API is running! 🌍",
      models_loaded: engine.isReady(),
      endpoints: {
        "/predict": "POST - Predict the AQI category from pollutant values",
        "/live-aqi": `GET - Get live AQI for ${place}`,
      },
    });
  });

  return app;
}
