import { describe, expect, it } from "vitest";
import { shapeCurrent, shapeForecast } from "./shaper.js";
import { currentBody, forecastBody, forecastEntry, START_DT } from "./testSupport.js";

describe("shapeCurrent", () => {
  it("maps the current weather payload", () => {
    const conditions = shapeCurrent("Berlin", currentBody("Berlin"));

    expect(conditions).toEqual({
      city: "Berlin",
      temperature: 12.5,
      humidity: 81,
      description: "light rain",
      iconId: "10d",
      latitude: 52.52,
      longitude: 13.405,
      timestamp: "2025-10-19T12:00:00.000Z",
    });
    expect(Object.isFrozen(conditions)).toBe(true);
  });
});

describe("shapeForecast", () => {
  it("keeps all 40 three-hour samples in strictly increasing order", () => {
    const table = shapeForecast("Berlin", forecastBody(40));

    expect(table.city).toBe("Berlin");
    expect(table.samples).toHaveLength(40);
    expect(table.samples[0].timestamp).toBe("2025-10-19T12:00:00.000Z");
    expect(table.samples[39].timestamp).toBe("2025-10-24T09:00:00.000Z");
    for (let i = 1; i < table.samples.length; i++) {
      expect(table.samples[i].timestamp > table.samples[i - 1].timestamp).toBe(true);
    }
  });

  it("extracts temperature, humidity, wind and POP as a percentage", () => {
    const [first, second] = shapeForecast("Berlin", forecastBody(2)).samples;

    expect(first.temperature).toBe(10);
    expect(first.humidity).toBe(50);
    expect(first.windSpeed).toBe(2);
    expect(first.precipitationProbability).toBeCloseTo(57, 10);
    expect(first.description).toBe("light rain");
    expect(second.temperature).toBe(10.5);
    expect(second.windSpeed).toBe(2.25);
    expect(second.precipitationProbability).toBe(0);
  });

  it("treats a missing pop as zero and passes out-of-range values through", () => {
    const { pop: _dropped, ...withoutPop } = forecastEntry(0);
    const table = shapeForecast("Berlin", {
      list: [withoutPop, { ...forecastEntry(1), pop: 1.2 }],
    });

    expect(table.samples[0].precipitationProbability).toBe(0);
    expect(table.samples[1].precipitationProbability).toBeCloseTo(120, 10);
  });

  it("drops malformed and non-increasing entries", () => {
    const broken = { ...forecastEntry(1), main: { temp: Number.NaN, humidity: 50 } };
    const table = shapeForecast("Berlin", {
      list: [forecastEntry(0), broken, forecastEntry(2), forecastEntry(2), forecastEntry(1), forecastEntry(3)],
    });

    expect(table.samples.map(sample => sample.timestamp)).toEqual([
      new Date((START_DT + 0 * 10800) * 1000).toISOString(),
      new Date((START_DT + 2 * 10800) * 1000).toISOString(),
      new Date((START_DT + 3 * 10800) * 1000).toISOString(),
    ]);
  });

  it("skips entries that are not objects", () => {
    const list = forecastBody(3).list;
    const table = shapeForecast("Berlin", { list: [null, ...list.slice(0, 1), "garbage", ...list.slice(1)] });

    expect(table.samples).toHaveLength(3);
    expect(table.samples[0].timestamp).toBe(new Date(START_DT * 1000).toISOString());
  });

  it("returns an empty table for an empty list", () => {
    expect(shapeForecast("Berlin", { list: [] }).samples).toEqual([]);
  });
});
