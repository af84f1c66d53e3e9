import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import type { PollutantField } from "../info/pollutants";
import {
  toPredictionPayload,
  type InferenceEngine,
  type Prediction,
  type PredictionPayload,
} from "./inference-service";
import { UpstreamError, ValidationError, describeError } from "../utils/errors";

export const DEFAULT_OPENWEATHER_BASE_URL = "https://api.openweathermap.org/data/2.5";

export interface Coordinate {
  name?: string;
  lat: number;
  lon: number;
}

export interface LivePredictionPayload extends PredictionPayload {
  components: Record<string, unknown>;
}

export interface LiveAirQualityServiceOptions {
  engine: InferenceEngine;
  location: Coordinate;
  apiKey?: string;
  baseUrl?: string;
  http?: AxiosInstance;
}

// Only list[0].components is consumed from the air_pollution response
const AirPollutionResponseSchema = z.object({
  list: z
    .array(z.object({ components: z.record(z.string(), z.unknown()) }))
    .min(1),
});

/**
 * Rename OpenWeather component keys onto the classifier's pollutant
 * fields. Absent components read as 0.
 */
export function toPollutantInput(
  components: Record<string, unknown>
): Record<PollutantField, unknown> {
  const read = (key: string): unknown => components[key] ?? 0;
  return {
    pm25: read("pm2_5"),
    pm10: read("pm10"),
    no2: read("no2"),
    so2: read("so2"),
    co: read("co"),
    o3: read("o3"),
  };
}

export function maskApiKey(apiKey: string): string {
  return `${apiKey.substring(0, 5)}... (${apiKey.length} chars)`;
}

export class LiveAirQualityService {
  private readonly engine: InferenceEngine;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;
  readonly location: Coordinate;

  constructor(options: LiveAirQualityServiceOptions) {
    this.engine = options.engine;
    this.location = options.location;
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENWEATHER_BASE_URL).replace(/\/+$/, "");
    this.http = options.http ?? axios.create();
  }

  /**
   * One provider request, one classification. No retries and no caching.
   */
  async fetchAndClassifyLive(
    coordinate: Coordinate = this.location
  ): Promise<LivePredictionPayload> {
    if (!this.apiKey) {
      throw new UpstreamError("OpenWeatherMap API key missing", "config");
    }
    this.engine.assertReady();

    const { lat, lon } = coordinate;
    console.log(
      `Fetching live air quality for ${coordinate.name ?? "location"} (${lat}, ${lon}) with API key: ${maskApiKey(this.apiKey)}`
    );

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(`${this.baseUrl}/air_pollution`, {
        params: { lat, lon, appid: this.apiKey },
        headers: { Accept: "application/json" },
        validateStatus: () => true,
      });
    } catch (error) {
      throw new UpstreamError(
        `Failed to fetch live data: ${describeError(error)}`,
        "fetch"
      );
    }

    console.log(`📊 OpenWeather status: ${response.status}`);
    if (response.status !== 200) {
      throw new UpstreamError(
        `Failed to fetch live data: provider responded with status ${response.status}`,
        "fetch"
      );
    }

    const parsed = AirPollutionResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamError(
        "Failed to parse live data: response has no list[0].components",
        "parse"
      );
    }
    const components = parsed.data.list[0].components;

    let prediction: Prediction;
    try {
      prediction = this.engine.classify(toPollutantInput(components));
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new UpstreamError(`Failed to parse live data: ${error.message}`, "parse");
      }
      throw error;
    }

    return { ...toPredictionPayload(prediction), components };
  }
}
