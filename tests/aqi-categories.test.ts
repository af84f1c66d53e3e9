import {
  AQI_CATEGORY_LABELS,
  isCategoryLabel,
  lookup,
  midpoint,
} from "../info/aqi-categories";

describe("aqi category catalog", () => {
  it("has non-empty metadata for every known label", () => {
    for (const label of AQI_CATEGORY_LABELS) {
      const metadata = lookup(label);
      expect(metadata.emoji).not.toBe("");
      expect(metadata.color).toMatch(/^#[0-9A-F]{6}$/);
      expect(metadata.range).not.toBe("");
      expect(metadata.health_tip).not.toBe("");
    }
  });

  it("returns the EPA colors and ranges", () => {
    expect(lookup("Good")).toMatchObject({ color: "#00E400", range: "0-50" });
    expect(lookup("Unhealthy for Sensitive Groups")).toMatchObject({
      color: "#FF7E00",
      range: "101-150",
    });
    expect(lookup("Hazardous")).toMatchObject({ color: "#7E0023", range: "301+" });
  });

  it("falls back to Moderate for unknown labels", () => {
    expect(lookup("Smoky")).toBe(lookup("Moderate"));
    expect(lookup("")).toBe(lookup("Moderate"));
    expect(lookup("good")).toBe(lookup("Moderate"));
  });

  it("returns the same record on every lookup", () => {
    expect(lookup("Unhealthy")).toBe(lookup("Unhealthy"));
    expect(lookup("unknown-label")).toBe(lookup("unknown-label"));
  });

  it("cannot be mutated", () => {
    expect(Object.isFrozen(lookup("Good"))).toBe(true);
  });

  it("maps labels to class midpoints", () => {
    expect(midpoint("Good")).toBe(25);
    expect(midpoint("Moderate")).toBe(75);
    expect(midpoint("Unhealthy for Sensitive Groups")).toBe(125);
    expect(midpoint("Unhealthy")).toBe(175);
    expect(midpoint("Very Unhealthy")).toBe(250);
    expect(midpoint("Hazardous")).toBe(350);
    expect(midpoint("unknown-label")).toBe(100);
  });

  it("recognizes only the six category labels", () => {
    expect(AQI_CATEGORY_LABELS).toHaveLength(6);
    expect(isCategoryLabel("Very Unhealthy")).toBe(true);
    expect(isCategoryLabel("Very unhealthy")).toBe(false);
  });
});
