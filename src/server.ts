import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  SubscribeRequestSchema,
  UnsubscribeRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { SAVED_CITIES } from "./config.js";
import type { DashboardStore } from "./dashboard.js";
import { isWeatherError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { ComparisonSet } from "./pipeline.js";
import type { RefreshDriver } from "./refreshDriver.js";
import {
  type ForecastDay,
  isValidCityArgs,
  isValidForecastArgs,
  isValidSetCitiesArgs,
  isValidSetUnitArgs,
} from "./types.js";
import { toUnit } from "./units.js";
import type { WeatherApi } from "./weatherClient.js";

const log = createLogger("MCP");

export const DASHBOARD_URI = "weather://dashboard";
export const DASHBOARD_JSON_URI = "weather://dashboard.json";

const CURRENT_URI_PATTERN = /^weather:\/\/(.+)\/current$/;

export function currentWeatherUri(city: string): string {
  return `weather://${encodeURIComponent(city)}/current`;
}

function textResult(text: string, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text }],
    ...(isError ? { isError: true } : {}),
  };
}

export interface WeatherDashboardServerDeps {
  api: WeatherApi;
  store: DashboardStore;
  driver: RefreshDriver<ComparisonSet>;
}

// サーバ
export class WeatherDashboardServer {
  private server: Server;
  private api: WeatherApi;
  private store: DashboardStore;
  private driver: RefreshDriver<ComparisonSet>;
  private subscriptions = new Set<string>();

  constructor({ api, store, driver }: WeatherDashboardServerDeps) {
    this.api = api;
    this.store = store;
    this.driver = driver;
    this.server = new Server({
      name: "openweather-dashboard-server",
      version: "0.1.0"
    }, {
      capabilities: {
        resources: { subscribe: true },
        tools: {}
      }
    });

    this.driver.onSnapshot(set => {
      this.store.apply(set);
      void this.notifyUpdated([DASHBOARD_URI, DASHBOARD_JSON_URI]);
    });

    this.setupHandlers();
    this.setupErrorHandling();
  }

  get refreshing(): boolean {
    return this.driver.active;
  }

  // エラーハンドリングのセットアップ
  private setupErrorHandling(): void {
    this.server.onerror = (error) => {
      log.error("Server error", error);
    };
    // 接続が切れたら更新ループも止める
    this.server.onclose = () => {
      this.driver.stop();
    };
  }

  private setupHandlers(): void {
    this.setupResourceHandlers();
    this.setupToolHandlers();
  }

  private async notifyUpdated(uris: string[]): Promise<void> {
    for (const uri of uris) {
      if (!this.subscriptions.has(uri)) {
        continue;
      }
      try {
        await this.server.sendResourceUpdated({ uri });
      } catch (error) {
        log.warn(`Could not notify subscribers of ${uri}`, error);
      }
    }
  }

  // 現在の天気を表示単位で取得
  private async currentJson(city: string): Promise<string> {
    const unit = this.store.current.unit;
    const conditions = await this.api.fetchCurrent(city, "metric");
    return JSON.stringify({
      ...conditions,
      temperature: toUnit(conditions.temperature, unit),
      unit,
    }, null, 2);
  }

  private async readCurrent(uri: string, city: string) {
    try {
      return {
        contents: [{
          uri,
          mimeType: "application/json",
          text: await this.currentJson(city)
        }]
      };
    } catch (error) {
      if (isWeatherError(error)) {
        throw new McpError(ErrorCode.InternalError, `Weather API error: ${error.message}`);
      }
      throw error;
    }
  }

  private setupResourceHandlers(): void {
    // 利用可能なリソース一覧の取得
    this.server.setRequestHandler(
      ListResourcesRequestSchema,
      async () => ({
        resources: [
          {
            uri: DASHBOARD_URI,
            name: "Weather dashboard",
            mimeType: "text/markdown",
            description: "Current weather, forecast charts, table, map and insights for the selected cities"
          },
          {
            uri: DASHBOARD_JSON_URI,
            name: "Weather dashboard (JSON)",
            mimeType: "application/json",
            description: "Chart models, table rows, map markers and messages of the current dashboard"
          },
          ...SAVED_CITIES.map(city => ({
            uri: currentWeatherUri(city),
            name: `Current weather in ${city}`,
            mimeType: "application/json",
            description: "Real-time temperature, humidity, conditions and location"
          }))
        ]
      })
    );

    this.server.setRequestHandler(
      ListResourceTemplatesRequestSchema,
      async () => ({
        resourceTemplates: [{
          uriTemplate: "weather://{city}/current",
          name: "Current weather for a city",
          mimeType: "application/json"
        }]
      })
    );

    this.server.setRequestHandler(
      ReadResourceRequestSchema,
      async (request) => {
        const uri = request.params.uri;
        if (uri === DASHBOARD_URI) {
          return {
            contents: [{ uri, mimeType: "text/markdown", text: this.store.markdown() }]
          };
        }
        if (uri === DASHBOARD_JSON_URI) {
          const view = this.store.view() ?? null;
          return {
            contents: [{ uri, mimeType: "application/json", text: JSON.stringify(view, null, 2) }]
          };
        }

        const match = CURRENT_URI_PATTERN.exec(uri);
        if (!match) {
          throw new McpError(
            ErrorCode.InvalidRequest,
            `Unknown resource: ${uri}`
          );
        }
        return this.readCurrent(uri, decodeURIComponent(match[1]));
      }
    );

    this.server.setRequestHandler(
      SubscribeRequestSchema,
      async (request) => {
        this.subscriptions.add(request.params.uri);
        return {};
      }
    );

    this.server.setRequestHandler(
      UnsubscribeRequestSchema,
      async (request) => {
        this.subscriptions.delete(request.params.uri);
        return {};
      }
    );
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(
      ListToolsRequestSchema,
      async () => ({
        tools: [
          {
            name: "set_cities",
            description: "Choose the dashboard city, optionally with a second city to compare, and refresh now",
            inputSchema: {
              type: "object",
              properties: {
                city: { type: "string", description: "Primary city name, e.g. 'Berlin' or 'London,GB'" },
                compareCity: { type: "string", description: "Comparison city; omit or leave empty for a single city" }
              },
              required: ["city"]
            }
          },
          {
            name: "set_unit",
            description: "Switch displayed temperatures between Celsius and Fahrenheit",
            inputSchema: {
              type: "object",
              properties: {
                unit: { type: "string", enum: ["C", "F"] }
              },
              required: ["unit"]
            }
          },
          {
            name: "get_dashboard",
            description: "Render the current dashboard as Markdown",
            inputSchema: { type: "object", properties: {} }
          },
          {
            name: "get_current_weather",
            description: "Get current weather for a city",
            inputSchema: {
              type: "object",
              properties: {
                city: { type: "string", description: "City name" }
              },
              required: ["city"]
            }
          },
          {
            name: "get_forecast",
            description: "Get weather forecast for a city",
            inputSchema: {
              type: "object",
              properties: {
                city: {
                  type: "string",
                  description: "City name"
                },
                days: {
                  type: "number",
                  description: "Number of days (1-5)",
                  minimum: 1,
                  maximum: 5
                }
              },
              required: ["city"]
            }
          }
        ]
      })
    );

    this.server.setRequestHandler(
      CallToolRequestSchema,
      async (request) => {
        const args = request.params.arguments;
        try {
          switch (request.params.name) {
            case "set_cities":
              return await this.setCities(args);
            case "set_unit":
              return this.setUnit(args);
            case "get_dashboard":
              return textResult(this.store.markdown());
            case "get_current_weather":
              return await this.currentWeather(args);
            case "get_forecast":
              return await this.forecast(args);
            default:
              throw new McpError(
                ErrorCode.MethodNotFound,
                `Unknown tool: ${request.params.name}`
              );
          }
        } catch (error) {
          if (isWeatherError(error)) {
            return textResult(`Weather API error: ${error.message}`, true);
          }
          throw error;
        }
      }
    );
  }

  private async setCities(args: unknown): Promise<CallToolResult> {
    if (!isValidSetCitiesArgs(args)) {
      throw new McpError(ErrorCode.InvalidParams, "Invalid set_cities arguments");
    }
    this.store.setCities(args.city, args.compareCity);
    await this.driver.trigger();
    return textResult(this.store.markdown());
  }

  // 単位の切り替え (再取得なし)
  private setUnit(args: unknown): CallToolResult {
    if (!isValidSetUnitArgs(args)) {
      throw new McpError(ErrorCode.InvalidParams, "Invalid set_unit arguments");
    }
    this.store.setUnit(args.unit === "F" ? "°F" : "°C");
    void this.notifyUpdated([DASHBOARD_URI, DASHBOARD_JSON_URI]);
    return textResult(this.store.markdown());
  }

  private async currentWeather(args: unknown): Promise<CallToolResult> {
    if (!isValidCityArgs(args)) {
      throw new McpError(ErrorCode.InvalidParams, "Invalid get_current_weather arguments");
    }
    return textResult(await this.currentJson(args.city));
  }

  private async forecast(args: unknown): Promise<CallToolResult> {
    if (!isValidForecastArgs(args)) {
      throw new McpError(ErrorCode.InvalidParams, "Invalid forecast arguments");
    }
    const days = Math.max(1, Math.min(args.days || 3, 5));
    const unit = this.store.current.unit;
    // API returns 3-hour intervals
    const table = await this.api.fetchForecast(args.city, "metric", days * 8);

    const forecasts: ForecastDay[] = [];
    for (let i = 0; i < table.samples.length; i += 8) {
      const sample = table.samples[i];
      forecasts.push({
        date: sample.timestamp.split("T")[0],
        temperature: toUnit(sample.temperature, unit),
        conditions: sample.description
      });
    }
    return textResult(JSON.stringify(forecasts, null, 2));
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    this.driver.stop();
    await this.server.close();
  }

  // サーバの実行
  async run(): Promise<void> {
    const shutdown = () => {
      this.close()
        .catch(error => log.error("Shutdown failed", error))
        .finally(() => process.exit(0));
    };
    process.on("SIGINT", shutdown);
    // クライアントが stdin を閉じたら終了
    process.stdin.once("end", shutdown);

    await this.connect(new StdioServerTransport());
    // stdout は MCP 通信用なので stderr に出力
    log.info("Weather dashboard MCP server running on stdio");
    void this.driver.start();
  }
}
