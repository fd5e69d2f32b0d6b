import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { DisplayUnit } from "./types.js";

const DEFAULT_BASE_URL = "https://api.openweathermap.org/data/2.5";
const DEFAULT_REFRESH_INTERVAL_SECONDS = 60;
const DEFAULT_FETCH_TIMEOUT_MS = 10000;
const DEFAULT_CITY = "London,GB";

export const SAVED_CITIES = [
  "Bhubaneswar,OD,IN",
  "Bilaspur,CT,IN",
  "Delhi,DL,IN",
  "Kolkata,WB,IN",
  "Mumbai,MH,IN",
  "Chennai,TN,IN",
  "Bengaluru,KA,IN",
  "New York,US",
  "London,GB",
] as const;

// Settings handed to the weather client at construction
export interface WeatherApiConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface DashboardConfig {
  api: WeatherApiConfig;
  refreshIntervalMs: number;
  defaultCity: string;
  defaultCompareCity?: string;
  defaultUnit: DisplayUnit;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

function getPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = getEnvVar(env, name);
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseDisplayUnit(raw: string | undefined): DisplayUnit | undefined {
  switch (raw?.trim().toLowerCase()) {
    case "c":
    case "°c":
    case "metric":
      return "°C";
    case "f":
    case "°f":
    case "imperial":
      return "°F";
    default:
      return undefined;
  }
}

/**
 * Reads the dashboard settings from an environment map.
 *
 * Only the API key is required; a missing key is reported before any
 * request is attempted.
 */
export function loadConfig(env: Env = process.env): DashboardConfig {
  const apiKey = getEnvVar(env, "OPENWEATHER_API_KEY");
  if (!apiKey) {
    throw new ConfigurationError("OPENWEATHER_API_KEY environment variable is required");
  }

  const rawUnit = getEnvVar(env, "DEFAULT_UNIT");
  const defaultUnit = parseDisplayUnit(rawUnit);
  if (rawUnit && !defaultUnit) {
    throw new ConfigurationError(`DEFAULT_UNIT must be C or F, got '${rawUnit}'`);
  }

  const rawLevel = getEnvVar(env, "LOG_LEVEL")?.toLowerCase() ?? "info";
  if (!isLogLevel(rawLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be debug, info, warn or error, got '${rawLevel}'`);
  }

  return {
    api: {
      apiKey,
      baseUrl: getEnvVar(env, "OPENWEATHER_BASE_URL") ?? DEFAULT_BASE_URL,
      timeoutMs: getPositiveInt(env, "FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS),
    },
    refreshIntervalMs:
      getPositiveInt(env, "REFRESH_INTERVAL_SECONDS", DEFAULT_REFRESH_INTERVAL_SECONDS) * 1000,
    defaultCity: getEnvVar(env, "DEFAULT_CITY") ?? DEFAULT_CITY,
    defaultCompareCity: getEnvVar(env, "DEFAULT_COMPARE_CITY"),
    defaultUnit: defaultUnit ?? "°C",
    logLevel: rawLevel,
  };
}
