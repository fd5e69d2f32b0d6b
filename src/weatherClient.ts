import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { WeatherApiConfig } from "./config.js";
import {
  AuthError,
  CityNotFoundError,
  NetworkError,
  TimeoutError,
  toWeatherError,
  type WeatherError,
} from "./errors.js";
import { createLogger } from "./logger.js";
import { shapeCurrent, shapeForecast } from "./shaper.js";
import {
  isCurrentResponse,
  isErrorBody,
  isForecastResponse,
  type CurrentConditions,
  type ForecastTable,
  type UnitSystem,
} from "./types.js";

const log = createLogger("weather");

// API endpoints relative to the base URL
export const ENDPOINTS = {
  CURRENT: "weather",
  FORECAST: "forecast",
} as const;

export interface WeatherClientOptions {
  // Replaces axios's HTTP transport; tests answer requests in process
  adapter?: AxiosAdapter;
}

export interface WeatherApi {
  fetchCurrent(city: string, units: UnitSystem): Promise<CurrentConditions>;
  fetchForecast(city: string, units: UnitSystem, count?: number): Promise<ForecastTable>;
}

function messageOf(body: unknown): string | undefined {
  return isErrorBody(body) && typeof body.message === "string" ? body.message : undefined;
}

function errorForStatus(city: string, status: number, body: unknown, cause?: unknown): WeatherError {
  const detail = messageOf(body);
  if (status === 404) {
    return new CityNotFoundError(city, { cause });
  }
  if (status === 401) {
    return new AuthError(`Weather API rejected the API key${detail ? `: ${detail}` : ""}`, { cause });
  }
  return new NetworkError(`Weather API error ${status}${detail ? `: ${detail}` : ""}`, status, { cause });
}

function mapRequestError(city: string, error: unknown): WeatherError {
  if (!axios.isAxiosError(error)) {
    return toWeatherError(error);
  }
  if (error.response) {
    return errorForStatus(city, error.response.status, error.response.data, error);
  }
  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return new TimeoutError(`Weather API request timed out: ${error.message}`, undefined, { cause: error });
  }
  return new NetworkError(`Weather API unreachable: ${error.message}`, undefined, { cause: error });
}

/**
 * OpenWeatherMap client for current conditions and the 5 day / 3 hour forecast.
 *
 * Each call issues exactly one GET; nothing is cached or retried.
 */
export class WeatherClient implements WeatherApi {
  private readonly http: AxiosInstance;

  constructor(config: WeatherApiConfig, options: WeatherClientOptions = {}) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      adapter: options.adapter,
      params: {
        appid: config.apiKey,
      },
    });
  }

  async fetchCurrent(city: string, units: UnitSystem): Promise<CurrentConditions> {
    const name = city.trim();
    const data = await this.get(ENDPOINTS.CURRENT, name, { q: name, units });
    if (!isCurrentResponse(data)) {
      throw new NetworkError(`Unexpected current weather payload for '${name}'`);
    }
    return shapeCurrent(name, data);
  }

  async fetchForecast(city: string, units: UnitSystem, count?: number): Promise<ForecastTable> {
    const name = city.trim();
    const data = await this.get(ENDPOINTS.FORECAST, name, {
      q: name,
      units,
      ...(count !== undefined ? { cnt: count } : {}),
    });
    if (!isForecastResponse(data)) {
      throw new NetworkError(`Unexpected forecast payload for '${name}'`);
    }
    return shapeForecast(name, data);
  }

  private async get(endpoint: string, city: string, params: Record<string, string | number>): Promise<unknown> {
    if (city.length === 0) {
      throw new CityNotFoundError(city);
    }

    log.debug(`GET ${endpoint} q=${city} units=${String(params.units)}`);
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(endpoint, { params });
      data = response.data;
    } catch (error) {
      throw mapRequestError(city, error);
    }

    // OpenWeather may report failures in the body: cod is 200 for weather, "200" for forecast
    if (isErrorBody(data) && data.cod !== undefined && String(data.cod) !== "200") {
      const status = Number(data.cod);
      throw errorForStatus(city, Number.isFinite(status) ? status : 500, data);
    }
    return data;
  }
}
