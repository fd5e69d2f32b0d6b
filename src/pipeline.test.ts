import { describe, expect, it } from "vitest";
import { CityNotFoundError, NetworkError } from "./errors.js";
import { fetchCityReport, runPipeline } from "./pipeline.js";
import { CITY_NOT_FOUND, TEST_API_CONFIG, fakeOpenWeather, healthyApi, type ReplyHandler } from "./testSupport.js";
import { WeatherClient } from "./weatherClient.js";

function clientWith(handler: ReplyHandler) {
  const fake = fakeOpenWeather(handler);
  return { api: new WeatherClient(TEST_API_CONFIG, { adapter: fake.adapter }), requests: fake.requests };
}

describe("fetchCityReport", () => {
  it("is ok only when both requests succeed", async () => {
    const { api } = clientWith(healthyApi());

    const report = await fetchCityReport(api, { name: "Berlin", unitSystem: "metric" });

    expect(report.status).toBe("ok");
    if (report.status === "ok") {
      expect(report.current.city).toBe("Berlin");
      expect(report.forecast.samples).toHaveLength(40);
    }
  });

  it("does not leak the half that succeeded", async () => {
    const { api } = clientWith((request, config) =>
      request.endpoint === "forecast" ? { status: 503, body: { message: "busy" } } : healthyApi()(request, config)
    );

    const report = await fetchCityReport(api, { name: "Berlin", unitSystem: "metric" });

    expect(report).not.toHaveProperty("current");
    expect(report.status).toBe("error");
    if (report.status === "error") {
      expect(report.errors).toHaveLength(1);
      expect(report.errors[0]).toBeInstanceOf(NetworkError);
      expect(report.errors[0].message).toBe("Weather API error 503: busy");
    }
  });

  it("keeps each request's own error", async () => {
    const { api } = clientWith(() => CITY_NOT_FOUND);

    const report = await fetchCityReport(api, { name: "Nonexistentville1234", unitSystem: "metric" });

    expect(report.status).toBe("error");
    if (report.status === "error") {
      expect(report.errors).toHaveLength(2);
      expect(report.errors.every(error => error instanceof CityNotFoundError)).toBe(true);
    }
  });
});

describe("runPipeline", () => {
  it("fetches one city in metric", async () => {
    const { api, requests } = clientWith(healthyApi());

    const set = await runPipeline(api, { primary: "Berlin" }, 3);

    expect(set.cycle).toBe(3);
    expect(set.secondary).toBeUndefined();
    expect(requests.map(request => request.params.units)).toEqual(["metric", "metric"]);
  });

  it("fetches both cities in comparison mode", async () => {
    const { api, requests } = clientWith(healthyApi(["Nowhere"]));

    const set = await runPipeline(api, { primary: "Berlin", secondary: "Nowhere" }, 1);

    expect(requests).toHaveLength(4);
    expect(set.primary.status).toBe("ok");
    expect(set.secondary?.status).toBe("error");
  });
});
