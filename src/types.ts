// OpenWeather 現在の天気レスポンス
export interface OpenWeatherCurrentResponse {
  cod?: number | string;
  message?: string;
  name?: string;
  dt: number;
  coord: {
    lat: number;
    lon: number;
  };
  main: {
    temp: number;
    humidity: number;
  };
  weather: Array<{
    description: string;
    icon: string;
  }>;
  wind?: {
    speed: number;
  };
}

// 予報レスポンスの3時間ごとのエントリ
export interface OpenWeatherForecastEntry {
  dt: number;
  main: {
    temp: number;
    humidity: number;
  };
  weather?: Array<{
    description: string;
    icon?: string;
  }>;
  wind: {
    speed: number;
  };
  pop?: number;
  dt_txt?: string;
}

// OpenWeather 5日間/3時間予報レスポンス
export interface OpenWeatherForecastResponse {
  cod?: number | string;
  message?: string | number;
  cnt?: number;
  list: OpenWeatherForecastEntry[];
}

// OpenWeather のエラーレスポンス
export interface OpenWeatherErrorBody {
  cod?: number | string;
  message?: string;
}

export type UnitSystem = "metric" | "imperial";

export type DisplayUnit = "°C" | "°F";

// CityQuery
export interface CityQuery {
  name: string;
  unitSystem: UnitSystem;
}

// CurrentConditions
export interface CurrentConditions {
  readonly city: string;
  readonly temperature: number;
  readonly humidity: number;
  readonly description: string;
  readonly iconId: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly timestamp: string;
}

// ForecastSample
export interface ForecastSample {
  readonly timestamp: string;
  readonly temperature: number;
  readonly humidity: number;
  readonly windSpeed: number;
  readonly precipitationProbability: number;
  readonly description: string;
}

// ForecastTable
export interface ForecastTable {
  readonly city: string;
  readonly samples: readonly ForecastSample[];
}

// ForecastDay (get_forecast tool)
export interface ForecastDay {
  date: string;
  temperature: number;
  conditions: string;
}

// DashboardSelection
export interface DashboardSelection {
  primary: string;
  secondary?: string;
  unit: DisplayUnit;
}

// SetCitiesArgs
export interface SetCitiesArgs {
  city: string;
  compareCity?: string;
}

// SetUnitArgs
export interface SetUnitArgs {
  unit: "C" | "F";
}

// CityArgs
export interface CityArgs {
  city: string;
}

// GetForecastArgs
export interface GetForecastArgs {
  city: string;
  days?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

// SetCitiesArgsの検証
export function isValidSetCitiesArgs(args: unknown): args is SetCitiesArgs {
  return (
    isRecord(args) &&
    isNonEmptyString(args.city) &&
    (args.compareCity === undefined || typeof args.compareCity === "string")
  );
}

// SetUnitArgsの検証
export function isValidSetUnitArgs(args: unknown): args is SetUnitArgs {
  return isRecord(args) && (args.unit === "C" || args.unit === "F");
}

// CityArgsの検証
export function isValidCityArgs(args: unknown): args is CityArgs {
  return isRecord(args) && isNonEmptyString(args.city);
}

// GetForecastArgsの検証
export function isValidForecastArgs(args: unknown): args is GetForecastArgs {
  return (
    isRecord(args) &&
    isNonEmptyString(args.city) &&
    (args.days === undefined || typeof args.days === "number")
  );
}

// APIレスポンスの形の検証
export function isCurrentResponse(data: unknown): data is OpenWeatherCurrentResponse {
  return (
    isRecord(data) &&
    typeof data.dt === "number" &&
    isRecord(data.coord) &&
    isRecord(data.main) &&
    Array.isArray(data.weather)
  );
}

export function isForecastResponse(data: unknown): data is OpenWeatherForecastResponse {
  return isRecord(data) && Array.isArray(data.list);
}

export function isErrorBody(data: unknown): data is OpenWeatherErrorBody {
  return isRecord(data) && ("cod" in data || "message" in data);
}
