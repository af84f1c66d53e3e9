/**
 * AQI category catalog
 *
 * The classifier decodes to one of six US EPA style categories. Each one
 * carries presentation metadata and an approximate numeric AQI, taken as
 * the midpoint of the category's index range. The midpoint is a display
 * proxy only and is not computed from pollutant breakpoints.
 */

export const AQI_CATEGORY_LABELS = [
  "Good",
  "Moderate",
  "Unhealthy for Sensitive Groups",
  "Unhealthy",
  "Very Unhealthy",
  "Hazardous",
] as const;

export type CategoryLabel = (typeof AQI_CATEGORY_LABELS)[number];

export interface CategoryMetadata {
  readonly emoji: string;
  readonly color: string;
  readonly range: string;
  readonly health_tip: string;
}

interface CategoryEntry {
  readonly midpoint: number;
  readonly metadata: CategoryMetadata;
}

const AQI_CATEGORIES: Readonly<Record<CategoryLabel, CategoryEntry>> =
  Object.freeze({
    Good: {
      midpoint: 25,
      metadata: Object.freeze({
        emoji: "🟢",
        color: "#00E400",
        range: "0-50",
        health_tip:
          "Air quality is satisfactory. A good day for outdoor activities and exercise. 🏃",
      }),
    },
    Moderate: {
      midpoint: 75,
      metadata: Object.freeze({
        emoji: "🟡",
        color: "#FFFF00",
        range: "51-100",
        health_tip:
          "Air quality is acceptable. Unusually sensitive people should consider shorter outdoor exertion. 🚶",
      }),
    },
    "Unhealthy for Sensitive Groups": {
      midpoint: 125,
      metadata: Object.freeze({
        emoji: "🟠",
        color: "#FF7E00",
        range: "101-150",
        health_tip:
          "Children, older adults and people with respiratory conditions should cut back on outdoor activity. 🏠",
      }),
    },
    Unhealthy: {
      midpoint: 175,
      metadata: Object.freeze({
        emoji: "🔴",
        color: "#FF0000",
        range: "151-200",
        health_tip:
          "Everyone should limit time outdoors. Wear a mask if you need to go out. 😷",
      }),
    },
    "Very Unhealthy": {
      midpoint: 250,
      metadata: Object.freeze({
        emoji: "🟣",
        color: "#8F3F97",
        range: "201-300",
        health_tip:
          "Health alert: avoid outdoor activity, keep windows closed and run an air purifier if you have one. ⚠️",
      }),
    },
    Hazardous: {
      midpoint: 350,
      metadata: Object.freeze({
        emoji: "🟤",
        color: "#7E0023",
        range: "301+",
        health_tip:
          "Emergency conditions: stay indoors and seek medical help if you have trouble breathing. 🚨",
      }),
    },
  });

// Unknown decoder output is shown as Moderate rather than rejected
const FALLBACK_LABEL: CategoryLabel = "Moderate";
const FALLBACK_MIDPOINT = 100;

export function isCategoryLabel(label: string): label is CategoryLabel {
  return (AQI_CATEGORY_LABELS as readonly string[]).includes(label);
}

export function lookup(label: string): CategoryMetadata {
  const key = isCategoryLabel(label) ? label : FALLBACK_LABEL;
  return AQI_CATEGORIES[key].metadata;
}

export function midpoint(label: string): number {
  return isCategoryLabel(label)
    ? AQI_CATEGORIES[label].midpoint
    : FALLBACK_MIDPOINT;
}
