import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { InternalAxiosRequestConfig } from 'axios';
import { WeatherOutcomeClient, validateWeatherCondition } from './weather-client.js';
import { stubWeatherHttp } from '../utils/test-helpers.js';

describe('WeatherOutcomeClient', () => {
  it('should compare the observed metric against the threshold', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = stubWeatherHttp({ '/current.json': { current: { temp_c: 21.5 } } }, requests);
    const client = new WeatherOutcomeClient(http, 'test-key');

    const outcome = await client.fetchOutcome({ kind: 'metric', location: 'Salt Lake City', metric: 'temp_c', threshold: 20 });

    assert.strictEqual(outcome, true);
    assert.strictEqual(requests.length, 1);
    assert.deepStrictEqual(requests[0].params, { key: 'test-key', q: 'Salt Lake City', aqi: 'yes' });
  });

  it('should treat a value equal to the threshold as side A', async () => {
    const http = stubWeatherHttp({ '/current.json': { current: { humidity: 60 } } });
    const client = new WeatherOutcomeClient(http, 'test-key');

    assert.strictEqual(await client.fetchOutcome({ kind: 'metric', location: 'Oslo', metric: 'humidity', threshold: 60 }), true);
    assert.strictEqual(await client.fetchOutcome({ kind: 'metric', location: 'Oslo', metric: 'humidity', threshold: 61 }), false);
  });

  it('should read the air quality index from the air_quality block', async () => {
    const http = stubWeatherHttp({ '/current.json': { current: { temp_c: 10, air_quality: { 'us-epa-index': 2 } } } });
    const client = new WeatherOutcomeClient(http, 'test-key');

    assert.strictEqual(await client.fetchMetric('Lima', 'us-epa-index'), 2);
  });

  it('should fail when the metric is missing', async () => {
    const http = stubWeatherHttp({ '/current.json': { current: { temp_c: 10 } } });
    const client = new WeatherOutcomeClient(http, 'test-key');

    await assert.rejects(
      client.fetchOutcome({ kind: 'metric', location: 'Lima', metric: 'wind_kph', threshold: 5 }),
      /returned no wind_kph for Lima/
    );
  });

  it('should report side A when any alert is active', async () => {
    const active = new WeatherOutcomeClient(
      stubWeatherHttp({ '/alerts.json': { alerts: { alert: [{ headline: 'Flood warning' }] } } }),
      'test-key'
    );
    const quiet = new WeatherOutcomeClient(stubWeatherHttp({ '/alerts.json': { alerts: { alert: [] } } }), 'test-key');

    assert.strictEqual(await active.fetchOutcome({ kind: 'alert', location: '21.8,-90.8' }), true);
    assert.strictEqual(await quiet.fetchOutcome({ kind: 'alert', location: '21.8,-90.8' }), false);
  });

  it('should propagate transport failures', async () => {
    const client = new WeatherOutcomeClient(stubWeatherHttp({}), 'test-key');
    await assert.rejects(client.fetchOutcome({ kind: 'alert', location: 'Lima' }), /No stubbed response for \/alerts.json/);
  });
});

describe('validateWeatherCondition', () => {
  it('should accept metric and alert conditions', () => {
    const metric = validateWeatherCondition({ kind: 'metric', location: ' Lima ', metric: 'precip_mm', threshold: 1.5 });
    assert.deepStrictEqual(metric.condition, { kind: 'metric', location: 'Lima', metric: 'precip_mm', threshold: 1.5 });

    const alert = validateWeatherCondition({ kind: 'alert', location: 'Lima' });
    assert.deepStrictEqual(alert, { valid: true, errors: [], condition: { kind: 'alert', location: 'Lima' } });
  });

  it('should list every problem with a metric condition', () => {
    const result = validateWeatherCondition({ kind: 'metric', location: '', metric: 'pressure_mb', threshold: 'high' });
    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(result.errors, [
      'condition.location is required',
      'condition.metric must be one of temp_c, wind_kph, precip_mm, humidity, us-epa-index',
      'condition.threshold must be a number',
    ]);
  });

  it('should reject unknown kinds and non-objects', () => {
    assert.deepStrictEqual(validateWeatherCondition({ kind: 'forecast', location: 'Lima' }).errors, [
      "condition.kind must be 'metric' or 'alert'",
    ]);
    assert.deepStrictEqual(validateWeatherCondition('rain').errors, ['condition must be an object']);
  });
});
