import { z } from "zod";
import { lookup, midpoint, type CategoryMetadata } from "../info/aqi-categories";
import {
  POLLUTANT_FIELDS,
  toFeatureRow,
  type PollutantField,
  type PollutantVector,
} from "../info/pollutants";
import {
  argmax,
  loadModelArtifacts,
  type ModelArtifacts,
} from "./model-loader";
import {
  AppError,
  InternalError,
  ModelUnavailableError,
  ValidationError,
  describeError,
} from "../utils/errors";

// Numbers or decimal strings, e.g. 12.5, "12.5" or "1.5e1"; no hex or binary
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const reading = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(DECIMAL_PATTERN, "Expected a decimal number")
      .pipe(z.coerce.number()),
  ])
  .pipe(z.number().finite().nonnegative());

const PollutantSchema = z.object({
  pm25: reading,
  pm10: reading,
  no2: reading,
  so2: reading,
  co: reading,
  o3: reading,
});

export interface Prediction {
  label: string;
  numericValue: number;
  confidence: number;
  metadata: CategoryMetadata;
  pollutants: PollutantVector;
  timestamp: string;
}

export interface PredictionPayload {
  success: true;
  aqi_class: string;
  aqi_value: number;
  confidence: number;
  emoji: string;
  color: string;
  range: string;
  health_tip: string;
  pollutants: Record<PollutantField, number>;
  timestamp: string;
}

export interface InferenceEngineOptions {
  loadError?: string;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate raw input into a pollutant vector. Presence of every field is
 * checked before any value is coerced.
 */
export function parsePollutantVector(input: unknown): PollutantVector {
  if (!isRecord(input)) {
    throw new ValidationError("Request body must be a JSON object");
  }

  for (const field of POLLUTANT_FIELDS) {
    if (input[field] === undefined) {
      throw new ValidationError(`Missing required field: ${field}`, field);
    }
  }

  const result = PollutantSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue.path[0]);
    throw new ValidationError(
      `Invalid value for ${field}: ${issue.message}`,
      field
    );
  }
  return Object.freeze(result.data);
}

function runStage<T>(stage: string, work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new InternalError(stage, error);
  }
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export class InferenceEngine {
  private readonly now: () => Date;
  private readonly loadError?: string;

  constructor(
    private readonly artifacts: ModelArtifacts | null,
    options: InferenceEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.loadError = options.loadError;
  }

  /**
   * Load the model directory once at startup. A failed load still yields an
   * engine; every classify call on it reports the model as unavailable.
   */
  static fromDirectory(
    dir: string,
    options: Omit<InferenceEngineOptions, "loadError"> = {}
  ): InferenceEngine {
    try {
      const artifacts = loadModelArtifacts(dir);
      console.log(`✅ ML models loaded from ${dir}`);
      return new InferenceEngine(artifacts, options);
    } catch (error) {
      const reason = describeError(error);
      console.error(`❌ Error loading models from ${dir}: ${reason}`);
      return new InferenceEngine(null, { ...options, loadError: reason });
    }
  }

  isReady(): boolean {
    return this.artifacts !== null;
  }

  assertReady(): ModelArtifacts {
    if (!this.artifacts) {
      throw new ModelUnavailableError(this.loadError);
    }
    return this.artifacts;
  }

  classify(input: unknown): Prediction {
    const { classifier, decoder } = this.assertReady();
    const pollutants = parsePollutantVector(input);

    const features = runStage("features", () => toFeatureRow(pollutants));
    const proba = runStage("classifier", () => classifier.predictProba(features));
    const label = runStage("decoder", () =>
      decoder.inverseTransform(argmax(proba))
    );

    return {
      label,
      numericValue: midpoint(label),
      confidence: roundToTenth(Math.max(...proba) * 100),
      metadata: lookup(label),
      pollutants,
      timestamp: this.now().toISOString(),
    };
  }
}

export function toPredictionPayload(prediction: Prediction): PredictionPayload {
  const { metadata, pollutants } = prediction;
  return {
    success: true,
    aqi_class: prediction.label,
    aqi_value: prediction.numericValue,
    confidence: prediction.confidence,
    emoji: metadata.emoji,
    color: metadata.color,
    range: metadata.range,
    health_tip: metadata.health_tip,
    pollutants: {
      pm25: pollutants.pm25,
      pm10: pollutants.pm10,
      no2: pollutants.no2,
      so2: pollutants.so2,
      co: pollutants.co,
      o3: pollutants.o3,
    },
    timestamp: prediction.timestamp,
  };
}
