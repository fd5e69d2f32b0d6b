#!/usr/bin/env node
import dotenv from "dotenv";
import { loadConfig } from "./config.js";
import { DashboardStore } from "./dashboard.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, setLogLevel } from "./logger.js";
import { runPipeline, type ComparisonSet } from "./pipeline.js";
import { RefreshDriver } from "./refreshDriver.js";
import { WeatherDashboardServer } from "./server.js";
import { WeatherClient } from "./weatherClient.js";

const log = createLogger("startup");

async function main(): Promise<void> {
  // Load .env before reading configuration
  dotenv.config();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const api = new WeatherClient(config.api);
  const store = new DashboardStore({
    primary: config.defaultCity,
    ...(config.defaultCompareCity ? { secondary: config.defaultCompareCity } : {}),
    unit: config.defaultUnit,
  });
  const driver = new RefreshDriver<ComparisonSet>(
    cycle => runPipeline(api, store.current, cycle),
    config.refreshIntervalMs
  );

  const server = new WeatherDashboardServer({ api, store, driver });
  await server.run();
}

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    log.error(`Configuration error: ${error.message}`);
  } else {
    log.error("Server failed", error);
  }
  process.exitCode = 1;
});
