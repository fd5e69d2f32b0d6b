import { toWeatherError, type WeatherError } from "./errors.js";
import type { CityQuery, CurrentConditions, ForecastTable } from "./types.js";
import type { WeatherApi } from "./weatherClient.js";

export type CityReport =
  | {
      readonly status: "ok";
      readonly query: CityQuery;
      readonly current: CurrentConditions;
      readonly forecast: ForecastTable;
    }
  | {
      readonly status: "error";
      readonly query: CityQuery;
      readonly errors: readonly WeatherError[];
    };

export interface ComparisonSet {
  readonly primary: CityReport;
  readonly secondary?: CityReport;
  readonly fetchedAt: string;
  readonly cycle: number;
}

export interface CitySelection {
  primary: string;
  secondary?: string;
}

/**
 * Fetches current conditions and the forecast for one city.
 *
 * Both requests go out together. The report is "ok" only when both succeed;
 * otherwise it carries each failure, so half a city never reaches the view.
 */
export async function fetchCityReport(api: WeatherApi, query: CityQuery): Promise<CityReport> {
  const [current, forecast] = await Promise.allSettled([
    api.fetchCurrent(query.name, query.unitSystem),
    api.fetchForecast(query.name, query.unitSystem),
  ]);

  if (current.status === "fulfilled" && forecast.status === "fulfilled") {
    return Object.freeze({
      status: "ok",
      query,
      current: current.value,
      forecast: forecast.value,
    });
  }

  const errors: WeatherError[] = [];
  if (current.status === "rejected") {
    errors.push(toWeatherError(current.reason));
  }
  if (forecast.status === "rejected") {
    errors.push(toWeatherError(forecast.reason));
  }
  return Object.freeze({ status: "error", query, errors: Object.freeze(errors) });
}

// Data is always fetched in metric; °F is a display conversion
export async function runPipeline(api: WeatherApi, selection: CitySelection, cycle: number): Promise<ComparisonSet> {
  const primaryQuery: CityQuery = { name: selection.primary, unitSystem: "metric" };
  const secondaryQuery: CityQuery | undefined =
    selection.secondary !== undefined ? { name: selection.secondary, unitSystem: "metric" } : undefined;

  const [primary, secondary] = await Promise.all([
    fetchCityReport(api, primaryQuery),
    secondaryQuery ? fetchCityReport(api, secondaryQuery) : Promise.resolve(undefined),
  ]);

  return Object.freeze({
    primary,
    ...(secondary ? { secondary } : {}),
    fetchedAt: new Date().toISOString(),
    cycle,
  });
}
