import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import type { WeatherApiConfig } from "./config.js";
import type {
  OpenWeatherCurrentResponse,
  OpenWeatherForecastEntry,
  OpenWeatherForecastResponse,
} from "./types.js";

// 2025-10-19 12:00 UTC
export const START_DT = 1760875200;
export const STEP_SECONDS = 3 * 60 * 60;

export const TEST_API_CONFIG: WeatherApiConfig = {
  apiKey: "test-secret",
  baseUrl: "https://weather.test/data/2.5",
  timeoutMs: 50,
};

export interface RecordedRequest {
  endpoint: string;
  params: Record<string, unknown>;
}

export type Reply = { status: number; body: unknown } | AxiosError;

export type ReplyHandler = (request: RecordedRequest, config: InternalAxiosRequestConfig) => Reply;

/**
 * In-process stand-in for the OpenWeather HTTP API, plugged in as an axios adapter.
 * Statuses of 400 and above reject the way axios's own adapters do.
 */
export function fakeOpenWeather(handler: ReplyHandler): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const params: Record<string, unknown> = { ...config.params };
    const request: RecordedRequest = { endpoint: config.url ?? "", params };
    requests.push(request);

    const reply = handler(request, config);
    if (reply instanceof AxiosError) {
      throw reply;
    }
    const response: AxiosResponse = {
      data: reply.body,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
      request: {},
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        {},
        response
      );
    }
    return response;
  };
  return { adapter, requests };
}

export function timeoutError(config: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError("timeout of 50ms exceeded", "ECONNABORTED", config, {});
}

export function connectionRefused(config: InternalAxiosRequestConfig): AxiosError {
  return new AxiosError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED", config, {});
}

export const CITY_NOT_FOUND = { status: 404, body: { cod: "404", message: "city not found" } };

export const INVALID_KEY = {
  status: 401,
  body: { cod: 401, message: "Invalid API key. Please see https://openweathermap.org/faq#error401 for more info." },
};

export interface CurrentOptions {
  temp?: number;
  humidity?: number;
  lat?: number;
  lon?: number;
  description?: string;
  icon?: string;
}

export function currentBody(name: string, options: CurrentOptions = {}): OpenWeatherCurrentResponse {
  return {
    cod: 200,
    name,
    dt: START_DT,
    coord: { lat: options.lat ?? 52.52, lon: options.lon ?? 13.405 },
    main: { temp: options.temp ?? 12.5, humidity: options.humidity ?? 81 },
    weather: [{ description: options.description ?? "light rain", icon: options.icon ?? "10d" }],
    wind: { speed: 4.1 },
  };
}

// temperature 10 + i/2, humidity 50 + i, wind 2 + i/4, pop alternating 0.57 and 0
export function forecastEntry(index: number): OpenWeatherForecastEntry {
  return {
    dt: START_DT + index * STEP_SECONDS,
    main: { temp: 10 + index / 2, humidity: 50 + index },
    weather: [{ description: index % 2 === 0 ? "light rain" : "broken clouds" }],
    wind: { speed: 2 + index / 4 },
    pop: index % 2 === 0 ? 0.57 : 0,
  };
}

export function forecastBody(count = 40): OpenWeatherForecastResponse {
  return {
    cod: "200",
    message: 0,
    cnt: count,
    list: Array.from({ length: count }, (_, index) => forecastEntry(index)),
  };
}

// Answers every city with the fixtures above unless it is listed as missing
export function healthyApi(missing: string[] = []): ReplyHandler {
  return (request) => {
    const city = String(request.params.q);
    if (missing.includes(city)) {
      return CITY_NOT_FOUND;
    }
    if (request.endpoint === "weather") {
      return { status: 200, body: currentBody(city) };
    }
    const count = typeof request.params.cnt === "number" ? request.params.cnt : 40;
    return { status: 200, body: forecastBody(count) };
  };
}
