import type {
  CurrentConditions,
  ForecastSample,
  ForecastTable,
  OpenWeatherCurrentResponse,
  OpenWeatherForecastEntry,
} from "./types.js";
import { isRecord } from "./types.js";

function isoFromUnix(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function shapeCurrent(city: string, raw: OpenWeatherCurrentResponse): CurrentConditions {
  const weather = raw.weather[0];
  return Object.freeze({
    city,
    temperature: raw.main.temp,
    humidity: raw.main.humidity,
    description: weather?.description ?? "",
    iconId: weather?.icon ?? "",
    latitude: raw.coord.lat,
    longitude: raw.coord.lon,
    timestamp: isoFromUnix(raw.dt),
  });
}

function isWellFormed(entry: unknown): entry is OpenWeatherForecastEntry {
  return (
    isRecord(entry) &&
    isFiniteNumber(entry.dt) &&
    isRecord(entry.main) &&
    isFiniteNumber(entry.main.temp) &&
    isFiniteNumber(entry.main.humidity) &&
    isRecord(entry.wind) &&
    isFiniteNumber(entry.wind.speed)
  );
}

function descriptionOf(entry: OpenWeatherForecastEntry): string {
  const first: unknown = Array.isArray(entry.weather) ? entry.weather[0] : undefined;
  return isRecord(first) && typeof first.description === "string" ? first.description : "";
}

// Keeps API order; a sample whose dt does not move past the last kept one is dropped
export function shapeForecast(city: string, raw: { list: readonly unknown[] }): ForecastTable {
  const samples: ForecastSample[] = [];
  let lastDt = Number.NEGATIVE_INFINITY;

  for (const entry of raw.list) {
    if (!isWellFormed(entry) || entry.dt <= lastDt) {
      continue;
    }
    lastDt = entry.dt;
    samples.push(
      Object.freeze({
        timestamp: isoFromUnix(entry.dt),
        temperature: entry.main.temp,
        humidity: entry.main.humidity,
        windSpeed: entry.wind.speed,
        precipitationProbability: isFiniteNumber(entry.pop) ? entry.pop * 100 : 0,
        description: descriptionOf(entry),
      })
    );
  }

  return Object.freeze({ city, samples: Object.freeze(samples) });
}
