/**
 * Weather Outcome Client
 *
 * Decides binary events from a WeatherAPI-compatible service:
 * - metric conditions compare one observed value against a threshold
 * - alert conditions ask whether any weather alert is active
 * Side A wins when the condition holds.
 */

import axios, { type AxiosInstance } from 'axios';
import { config } from '../config.js';

export const WEATHER_METRICS = ['temp_c', 'wind_kph', 'precip_mm', 'humidity', 'us-epa-index'] as const;
export type WeatherMetric = (typeof WEATHER_METRICS)[number];

export type WeatherCondition =
  | { kind: 'metric'; location: string; metric: WeatherMetric; threshold: number }
  | { kind: 'alert'; location: string };

interface CurrentResponse {
  location?: { name?: string };
  current?: {
    temp_c?: number;
    wind_kph?: number;
    precip_mm?: number;
    humidity?: number;
    air_quality?: Record<string, number | undefined>;
  };
}

interface AlertsResponse {
  alerts?: { alert?: unknown[] };
}

function isWeatherMetric(value: unknown): value is WeatherMetric {
  return typeof value === 'string' && WEATHER_METRICS.some((metric) => metric === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a weather condition from a request body
 */
export function validateWeatherCondition(input: unknown): {
  valid: boolean;
  errors: string[];
  condition?: WeatherCondition;
} {
  if (!isRecord(input)) {
    return { valid: false, errors: ['condition must be an object'] };
  }

  const errors: string[] = [];
  const { kind, location, metric, threshold } = input;

  if (typeof location !== 'string' || location.trim() === '') {
    errors.push('condition.location is required');
  }

  if (kind === 'alert') {
    if (errors.length > 0 || typeof location !== 'string') return { valid: false, errors };
    return { valid: true, errors, condition: { kind, location: location.trim() } };
  }

  if (kind !== 'metric') {
    errors.push("condition.kind must be 'metric' or 'alert'");
    return { valid: false, errors };
  }

  if (!isWeatherMetric(metric)) {
    errors.push(`condition.metric must be one of ${WEATHER_METRICS.join(', ')}`);
  }
  if (typeof threshold !== 'number' || !Number.isFinite(threshold)) {
    errors.push('condition.threshold must be a number');
  }

  if (errors.length > 0 || typeof location !== 'string' || !isWeatherMetric(metric) || typeof threshold !== 'number') {
    return { valid: false, errors };
  }
  return { valid: true, errors, condition: { kind, location: location.trim(), metric, threshold } };
}

export function describeCondition(condition: WeatherCondition): string {
  return condition.kind === 'alert'
    ? `weather alert active in ${condition.location}`
    : `${condition.metric} >= ${condition.threshold} in ${condition.location}`;
}

export class WeatherOutcomeClient {
  constructor(
    private http: AxiosInstance,
    private apiKey: string
  ) {}

  static fromConfig(): WeatherOutcomeClient {
    const http = axios.create({ baseURL: config.weather.apiUrl, timeout: 10_000 });
    return new WeatherOutcomeClient(http, config.weather.apiKey);
  }

  /**
   * Observed value of `metric` at `location`. Throws when the service does not report it.
   */
  async fetchMetric(location: string, metric: WeatherMetric): Promise<number> {
    const response = await this.http.get<CurrentResponse>('/current.json', {
      params: { key: this.apiKey, q: location, aqi: 'yes' },
    });

    const current = response.data.current;
    const value = metric === 'us-epa-index' ? current?.air_quality?.[metric] : current?.[metric];
    if (typeof value !== 'number') {
      throw new Error(`Weather service returned no ${metric} for ${location}`);
    }
    return value;
  }

  async fetchAlertCount(location: string): Promise<number> {
    const response = await this.http.get<AlertsResponse>('/alerts.json', {
      params: { key: this.apiKey, q: location },
    });

    const alerts = response.data.alerts?.alert;
    if (!Array.isArray(alerts)) {
      throw new Error(`Weather service returned no alert list for ${location}`);
    }
    return alerts.length;
  }

  /**
   * true when side A wins
   */
  async fetchOutcome(condition: WeatherCondition): Promise<boolean> {
    try {
      if (condition.kind === 'alert') {
        return (await this.fetchAlertCount(condition.location)) > 0;
      }
      const value = await this.fetchMetric(condition.location, condition.metric);
      console.log(`[Weather] ${condition.location} ${condition.metric}=${value} (threshold ${condition.threshold})`);
      return value >= condition.threshold;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Weather] Failed to evaluate "${describeCondition(condition)}":`, message);
      throw error;
    }
  }
}
