import { formatFixed, formatTemperature, formatTimestamp, titleCase } from "./format.js";
import type { CityReport, ComparisonSet } from "./pipeline.js";
import type { CurrentConditions, DisplayUnit, ForecastSample, ForecastTable } from "./types.js";
import { toUnit } from "./units.js";

export const MAP_ZOOM = 6;
export const RAINY_THRESHOLD = 50;

export type ChartId = "temperature" | "humidity" | "wind" | "precipitation";

export interface CitySummary {
  label: string;
  temperature: string;
  humidity: string;
  description: string;
  iconUrl: string;
  updated: string;
}

export interface ChartSeries {
  label: string;
  points: Array<{ timestamp: string; value: number }>;
}

export interface ChartModel {
  id: ChartId;
  title: string;
  yLabel: string;
  // Shared by every series in the chart
  xAxis: string[];
  series: ChartSeries[];
}

export interface TableRow {
  timestamp: string;
  city: string;
  temperature: string;
  humidity: string;
  wind_speed: string;
  precip_prob: string;
}

export interface MapMarker {
  label: string;
  latitude: number;
  longitude: number;
  url: string;
}

export interface CityInsights {
  label: string;
  avgTemperature: string;
  maxTemperature: string;
  minTemperature: string;
  avgWindSpeed: string;
  rainyPeriods: number;
}

export interface DashboardMessage {
  label: string;
  kind: string;
  text: string;
}

export interface DashboardView {
  unit: DisplayUnit;
  compareMode: boolean;
  fetchedAt: string;
  cycle: number;
  banner?: string;
  messages: DashboardMessage[];
  summaries: CitySummary[];
  charts: ChartModel[];
  table: { columns: Array<keyof TableRow>; rows: TableRow[] };
  map: { zoom: number; markers: MapMarker[] };
  insights: CityInsights[];
}

export interface BuildOptions {
  // Sticky banner carried over from an earlier cycle
  banner?: string;
}

interface ActiveCity {
  label: string;
  current: CurrentConditions;
  forecast: ForecastTable;
}

const TABLE_COLUMNS: Array<keyof TableRow> = [
  "timestamp",
  "city",
  "temperature",
  "humidity",
  "wind_speed",
  "precip_prob",
];

export function iconUrl(iconId: string): string {
  return `https://openweathermap.org/img/wn/${iconId}@2x.png`;
}

export function mapUrl(latitude: number, longitude: number, zoom = MAP_ZOOM): string {
  return `https://www.openstreetmap.org/?mlat=${latitude}&mlon=${longitude}#map=${zoom}/${latitude}/${longitude}`;
}

// Two cities with the same name still get separate, distinguishable series
export function seriesLabels(reports: readonly CityReport[]): string[] {
  const names = reports.map(report => report.query.name.trim());
  if (names.length === 2 && names[0].toLowerCase() === names[1].toLowerCase()) {
    return names.map((name, index) => `${name} (${index + 1})`);
  }
  return names;
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function buildChart(
  id: ChartId,
  title: string,
  yLabel: string,
  cities: ActiveCity[],
  pick: (sample: ForecastSample) => number
): ChartModel {
  const axis = new Set<string>();
  const series = cities.map(city => ({
    label: city.label,
    points: city.forecast.samples.map(sample => {
      axis.add(sample.timestamp);
      return { timestamp: sample.timestamp, value: pick(sample) };
    }),
  }));
  return { id, title, yLabel, xAxis: [...axis].sort(), series };
}

function buildInsights(city: ActiveCity, unit: DisplayUnit): CityInsights {
  const temps = city.forecast.samples.map(sample => toUnit(sample.temperature, unit));
  const winds = city.forecast.samples.map(sample => sample.windSpeed);
  return {
    label: city.label,
    avgTemperature: formatTemperature(average(temps), unit),
    maxTemperature: formatTemperature(temps.length ? Math.max(...temps) : null, unit),
    minTemperature: formatTemperature(temps.length ? Math.min(...temps) : null, unit),
    avgWindSpeed: formatFixed(average(winds)),
    rainyPeriods: city.forecast.samples.filter(sample => sample.precipitationProbability > RAINY_THRESHOLD).length,
  };
}

// Only temperatures are converted; failed cities contribute a message instead of data
export function buildDashboard(set: ComparisonSet, unit: DisplayUnit, options: BuildOptions = {}): DashboardView {
  const reports = set.secondary ? [set.primary, set.secondary] : [set.primary];
  const labels = seriesLabels(reports);

  const active: ActiveCity[] = [];
  const messages: DashboardMessage[] = [];
  let banner = options.banner;

  reports.forEach((report, index) => {
    const label = labels[index];
    if (report.status === "ok") {
      active.push({ label, current: report.current, forecast: report.forecast });
      return;
    }
    for (const error of report.errors) {
      if (error.kind === "auth") {
        banner ??= error.message;
      } else {
        messages.push({ label, kind: error.kind, text: error.message });
      }
    }
  });

  const summaries = active.map<CitySummary>(({ label, current }) => ({
    label,
    temperature: formatFixed(toUnit(current.temperature, unit)),
    humidity: formatFixed(current.humidity),
    description: titleCase(current.description),
    iconUrl: iconUrl(current.iconId),
    updated: formatTimestamp(current.timestamp),
  }));

  const charts = [
    buildChart("temperature", "Temperature Trend (Next 5 Days)", `Temperature (${unit})`, active, s =>
      toUnit(s.temperature, unit)
    ),
    buildChart("humidity", "Humidity Trend", "Humidity (%)", active, s => s.humidity),
    buildChart("wind", "Wind Speed Trend", "Wind Speed (m/s)", active, s => s.windSpeed),
    buildChart("precipitation", "Precipitation Probability", "Rain Chance (%)", active, s => s.precipitationProbability),
  ];

  const rows = active.flatMap(({ label, forecast }) =>
    forecast.samples.map<TableRow>(sample => ({
      timestamp: formatTimestamp(sample.timestamp),
      city: label,
      temperature: formatFixed(toUnit(sample.temperature, unit)),
      humidity: formatFixed(sample.humidity),
      wind_speed: formatFixed(sample.windSpeed),
      precip_prob: formatFixed(sample.precipitationProbability),
    }))
  );

  const markers = active.map<MapMarker>(({ label, current }) => ({
    label,
    latitude: current.latitude,
    longitude: current.longitude,
    url: mapUrl(current.latitude, current.longitude),
  }));

  return {
    unit,
    compareMode: set.secondary !== undefined,
    fetchedAt: set.fetchedAt,
    cycle: set.cycle,
    ...(banner !== undefined ? { banner } : {}),
    messages,
    summaries,
    charts,
    table: { columns: [...TABLE_COLUMNS], rows },
    map: { zoom: MAP_ZOOM, markers },
    insights: active.map(city => buildInsights(city, unit)),
  };
}

function renderSummary(summary: CitySummary, unit: DisplayUnit): string[] {
  return [
    `### ${summary.label}`,
    `- Temperature (${unit}): ${summary.temperature}`,
    `- Humidity (%): ${summary.humidity}`,
    `- Condition: **${summary.description}**`,
    `- Icon: ${summary.iconUrl}`,
    `- Updated: ${summary.updated}`,
    "",
  ];
}

function renderChart(chart: ChartModel): string[] {
  const lines = [`### ${chart.title}`, `_${chart.yLabel} over ${chart.xAxis.length} time steps_`];
  for (const series of chart.series) {
    lines.push(`- ${series.label}: ${series.points.map(point => formatFixed(point.value)).join(", ")}`);
  }
  lines.push("");
  return lines;
}

export function renderDashboardMarkdown(view: DashboardView): string {
  const lines: string[] = ["# Weather Analytics Dashboard", ""];

  if (view.banner) {
    lines.push(`> **Authentication failed:** ${view.banner}`, "");
  }
  lines.push(`_Updated ${formatTimestamp(view.fetchedAt)} UTC, cycle ${view.cycle}, unit ${view.unit}_`, "");

  for (const message of view.messages) {
    lines.push(`**Error (${message.label}):** ${message.text}`);
  }
  if (view.messages.length > 0) {
    lines.push("");
  }

  if (view.summaries.length > 0) {
    lines.push(view.compareMode ? "## Current Weather - Comparison" : "## Current Weather", "");
    for (const summary of view.summaries) {
      lines.push(...renderSummary(summary, view.unit));
    }

    lines.push("## Charts", "");
    for (const chart of view.charts) {
      lines.push(...renderChart(chart));
    }

    lines.push("## City Locations", "");
    for (const marker of view.map.markers) {
      lines.push(`- ${marker.label}: ${marker.latitude}, ${marker.longitude} (${marker.url})`);
    }
    lines.push("");

    lines.push("## Forecast Data Table", "");
    lines.push(`| ${view.table.columns.join(" | ")} |`);
    lines.push(`|${view.table.columns.map(() => "---").join("|")}|`);
    for (const row of view.table.rows) {
      lines.push(`| ${view.table.columns.map(column => row[column]).join(" | ")} |`);
    }
    lines.push("");

    lines.push("## 5-Day Forecast Insights", "");
    for (const insight of view.insights) {
      lines.push(
        `### ${insight.label}`,
        `- Avg Temperature: ${insight.avgTemperature}`,
        `- Max Temperature: ${insight.maxTemperature}`,
        `- Min Temperature: ${insight.minTemperature}`,
        `- Avg Wind Speed: ${insight.avgWindSpeed} m/s`,
        `- Rainy Periods (>${RAINY_THRESHOLD}%): ${insight.rainyPeriods} times`,
        ""
      );
    }
  }

  return lines.join("\n").trimEnd() + "\n";
}
