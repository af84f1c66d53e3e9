import { Hono } from "hono";
import {
  toPredictionPayload,
  type InferenceEngine,
} from "../services/inference-service";
import { ValidationError, toErrorResponse } from "../utils/errors";

export function createPredictionRoutes(engine: InferenceEngine) {
  const app = new Hono();

  // Classify six pollutant readings
  app.post("/predict", async (c) => {
    try {
      let body: unknown;
      try {
        body = await c.req.json<unknown>();
      } catch {
        throw new ValidationError("Request body must be valid JSON");
      }

      console.log("📩 Received prediction request:", JSON.stringify(body));

      const prediction = engine.classify(body);

      console.log(
        `Returning prediction: ${prediction.label} (${prediction.confidence}% confidence)`
      );

      return c.json(toPredictionPayload(prediction));
    } catch (error) {
      const { status, body } = toErrorResponse(error, "Prediction failed");
      return c.json(body, status);
    }
  });

  return app;
}
