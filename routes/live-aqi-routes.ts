import { Hono } from "hono";
import type { LiveAirQualityService } from "../services/live-air-quality-service";
import { toErrorResponse } from "../utils/errors";

export function createLiveAqiRoutes(service: LiveAirQualityService) {
  const app = new Hono();

  // Live readings for the configured location, classified by the model
  app.get("/live-aqi", async (c) => {
    try {
      const data = await service.fetchAndClassifyLive();

      console.log(
        `Returning live AQI for ${service.location.name ?? "location"}: ${data.aqi_class}`
      );

      return c.json(data);
    } catch (error) {
      const { status, body } = toErrorResponse(error, "Live AQI fetch failed");
      return c.json(body, status);
    }
  });

  return app;
}
