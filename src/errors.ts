export type WeatherErrorKind =
  | "configuration"
  | "city_not_found"
  | "auth"
  | "network"
  | "timeout";

// Base class for everything the dashboard reports to the user
export abstract class WeatherError extends Error {
  abstract readonly kind: WeatherErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing or unusable settings, fatal at startup
export class ConfigurationError extends WeatherError {
  readonly kind = "configuration";
}

export class CityNotFoundError extends WeatherError {
  readonly kind = "city_not_found";

  constructor(readonly city: string, options?: { cause?: unknown }) {
    super(`City '${city}' not found.`, options);
  }
}

// API key missing or rejected; stays on screen for the rest of the session
export class AuthError extends WeatherError {
  readonly kind = "auth";
}

export class NetworkError extends WeatherError {
  readonly kind: "network" | "timeout" = "network";

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TimeoutError extends NetworkError {
  readonly kind = "timeout";
}

export function isWeatherError(error: unknown): error is WeatherError {
  return error instanceof WeatherError;
}

// Wraps anything thrown at the pipeline boundary into the taxonomy
export function toWeatherError(error: unknown): WeatherError {
  if (isWeatherError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, undefined, { cause: error });
}
