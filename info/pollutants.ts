// Feature order the classifier was trained on. Changing it silently
// changes every prediction.
export const POLLUTANT_FIELDS = ["pm25", "pm10", "no2", "so2", "co", "o3"] as const;

export type PollutantField = (typeof POLLUTANT_FIELDS)[number];

export type PollutantVector = Readonly<Record<PollutantField, number>>;

export function toFeatureRow(vector: PollutantVector): number[] {
  return POLLUTANT_FIELDS.map((field) => vector[field]);
}
