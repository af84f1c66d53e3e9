import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import {
  DEFAULT_OPENWEATHER_BASE_URL,
  type Coordinate,
} from "../services/live-air-quality-service";

export interface AppConfig {
  port: number;
  openWeatherApiKey?: string;
  openWeatherBaseUrl: string;
  liveLocation: Required<Coordinate>;
  modelDir: string;
  allowedOrigins: string[];
}

// Hyderabad, the one location the live endpoint serves by default
const DEFAULT_LOCATION = { name: "Hyderabad", lat: 17.385, lon: 78.4867 };

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  OPENWEATHER_API_KEY: optionalString,
  OPENWEATHER_BASE_URL: z.string().url().default(DEFAULT_OPENWEATHER_BASE_URL),
  LIVE_LOCATION_NAME: z.string().min(1).default(DEFAULT_LOCATION.name),
  LIVE_LAT: z.coerce.number().min(-90).max(90).default(DEFAULT_LOCATION.lat),
  LIVE_LON: z.coerce.number().min(-180).max(180).default(DEFAULT_LOCATION.lon),
  MODEL_DIR: optionalString,
  CORS_ORIGINS: z.string().default("http://localhost:3000"),
});

/**
 * Load the first .env file found. Variables already in the process
 * environment win.
 */
export function loadEnvironment(): string | undefined {
  const envPaths = [".env", "../.env", resolve(process.cwd(), ".env")];

  for (const path of envPaths) {
    if (!existsSync(path)) continue;
    const result = dotenv.config({ path });
    if (result.error) {
      throw result.error;
    }
    console.log(`Environment variables loaded from: ${path}`);
    return path;
  }

  console.warn("No .env file found! Using environment variables from process.");
  return undefined;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration ${issue.path.join(".")}: ${issue.message}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    openWeatherApiKey: vars.OPENWEATHER_API_KEY,
    openWeatherBaseUrl: vars.OPENWEATHER_BASE_URL,
    liveLocation: {
      name: vars.LIVE_LOCATION_NAME,
      lat: vars.LIVE_LAT,
      lon: vars.LIVE_LON,
    },
    modelDir: vars.MODEL_DIR ?? resolve(process.cwd(), "models"),
    allowedOrigins: vars.CORS_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
