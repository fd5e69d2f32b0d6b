import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ErrorCode, ResourceUpdatedNotificationSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DashboardStore } from "./dashboard.js";
import { runPipeline, type ComparisonSet } from "./pipeline.js";
import { RefreshDriver } from "./refreshDriver.js";
import { DASHBOARD_JSON_URI, DASHBOARD_URI, WeatherDashboardServer, currentWeatherUri } from "./server.js";
import { TEST_API_CONFIG, fakeOpenWeather, healthyApi } from "./testSupport.js";
import { WeatherClient } from "./weatherClient.js";

function firstText(result: unknown): string {
  if (typeof result === "object" && result !== null) {
    const items = "content" in result ? result.content : "contents" in result ? result.contents : undefined;
    if (Array.isArray(items)) {
      const first: unknown = items[0];
      if (typeof first === "object" && first !== null && "text" in first && typeof first.text === "string") {
        return first.text;
      }
    }
  }
  throw new Error("result carries no text");
}

let cleanup: Array<() => Promise<void>> = [];

async function setup() {
  const fake = fakeOpenWeather(healthyApi(["Nonexistentville1234", "Atlantis"]));
  const api = new WeatherClient(TEST_API_CONFIG, { adapter: fake.adapter });
  const store = new DashboardStore({ primary: "Berlin", unit: "°C" });
  const driver = new RefreshDriver<ComparisonSet>(cycle => runPipeline(api, store.current, cycle), 60_000);
  const server = new WeatherDashboardServer({ api, store, driver });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "dashboard-test", version: "0.0.0" });
  await client.connect(clientTransport);
  await driver.start();

  cleanup.push(async () => {
    await client.close();
    await server.close();
  });
  return { client, server, driver, requests: fake.requests };
}

afterEach(async () => {
  for (const close of cleanup) {
    await close();
  }
  cleanup = [];
});

describe("WeatherDashboardServer", () => {
  it("lists the dashboard tools", async () => {
    const { client } = await setup();

    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name)).toEqual([
      "set_cities",
      "set_unit",
      "get_dashboard",
      "get_current_weather",
      "get_forecast",
    ]);
  });

  it("serves the dashboard fetched at start", async () => {
    const { client, requests } = await setup();

    const text = firstText(await client.callTool({ name: "get_dashboard", arguments: {} }));

    expect(requests.map(request => request.params.q)).toEqual(["Berlin", "Berlin"]);
    expect(text).toContain("\n### Berlin\n");
    expect(text).toContain("\n| 2025-10-19 12:00 | Berlin | 10.00 | 50.00 | 2.00 | 57.00 |\n");
  });

  it("refreshes immediately when the cities change", async () => {
    const { client, requests } = await setup();

    const text = firstText(
      await client.callTool({ name: "set_cities", arguments: { city: "Berlin", compareCity: "Nonexistentville1234" } })
    );

    expect(requests).toHaveLength(6);
    expect(text).toContain("\n**Error (Nonexistentville1234):** City 'Nonexistentville1234' not found.\n");
    expect(text).toContain("\n## Current Weather - Comparison\n");
  });

  it("switches units without fetching again", async () => {
    const { client, requests } = await setup();
    const before = requests.length;

    const text = firstText(await client.callTool({ name: "set_unit", arguments: { unit: "F" } }));

    expect(requests).toHaveLength(before);
    expect(text).toContain("\n- Temperature (°F): 54.50\n");
    expect(text).toContain("\n| 2025-10-19 12:00 | Berlin | 50.00 | 50.00 | 2.00 | 57.00 |\n");
  });

  it("returns one forecast entry per day", async () => {
    const { client, requests } = await setup();

    const text = firstText(await client.callTool({ name: "get_forecast", arguments: { city: "Berlin", days: 2 } }));

    expect(requests[requests.length - 1].params.cnt).toBe(16);
    expect(JSON.parse(text)).toEqual([
      { date: "2025-10-19", temperature: 10, conditions: "light rain" },
      { date: "2025-10-20", temperature: 14, conditions: "light rain" },
    ]);
  });

  it("reports weather errors as tool errors", async () => {
    const { client } = await setup();

    const result = await client.callTool({ name: "get_current_weather", arguments: { city: "Atlantis" } });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe("Weather API error: City 'Atlantis' not found.");
  });

  it("rejects invalid arguments and unknown tools", async () => {
    const { client } = await setup();

    await expect(client.callTool({ name: "set_unit", arguments: { unit: "K" } })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    await expect(client.callTool({ name: "launch", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });

  it("serves the dashboard as JSON", async () => {
    const { client } = await setup();

    const view: unknown = JSON.parse(firstText(await client.readResource({ uri: DASHBOARD_JSON_URI })));

    expect(view).toMatchObject({
      unit: "°C",
      compareMode: false,
      map: { zoom: 6, markers: [{ label: "Berlin", latitude: 52.52, longitude: 13.405 }] },
    });
    expect(view).toHaveProperty("table.rows.length", 40);
    expect(view).toHaveProperty("charts.0.xAxis.length", 40);
  });

  it("reads current weather for any city by URI", async () => {
    const { client, requests } = await setup();
    const uri = currentWeatherUri("New York,US");

    const payload: unknown = JSON.parse(firstText(await client.readResource({ uri })));

    expect(uri).toBe("weather://New%20York%2CUS/current");
    expect(requests[requests.length - 1].params.q).toBe("New York,US");
    expect(payload).toMatchObject({ city: "New York,US", temperature: 12.5, unit: "°C" });
  });

  it("rejects unknown resources", async () => {
    const { client } = await setup();

    await expect(client.readResource({ uri: "weather://nowhere" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it("lists saved cities alongside the dashboard", async () => {
    const { client } = await setup();

    const { resources } = await client.listResources();

    expect(resources.map(resource => resource.uri).slice(0, 3)).toEqual([
      DASHBOARD_URI,
      DASHBOARD_JSON_URI,
      "weather://Bhubaneswar%2COD%2CIN/current",
    ]);
    expect(resources).toHaveLength(11);
  });

  it("stops refreshing once the client disconnects", async () => {
    const { client, server, driver, requests } = await setup();
    expect(server.refreshing).toBe(true);

    await client.close();

    expect(server.refreshing).toBe(false);
    const sent = requests.length;
    await driver.trigger();
    expect(requests).toHaveLength(sent);
  });

  it("notifies subscribers when the dashboard refreshes", async () => {
    const { client } = await setup();
    const updated: string[] = [];
    client.setNotificationHandler(ResourceUpdatedNotificationSchema, async notification => {
      updated.push(notification.params.uri);
    });

    await client.subscribeResource({ uri: DASHBOARD_URI });
    await client.callTool({ name: "set_cities", arguments: { city: "Paris" } });

    await vi.waitFor(() => expect(updated).toContain(DASHBOARD_URI));
    expect(updated).not.toContain(DASHBOARD_JSON_URI);
  });
});
