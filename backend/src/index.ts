/**
 * Wagering API server
 */

import { config, validateConfig } from './config.js';
import { createApp } from './app.js';
import { createWagerService } from './services/wager-service.js';
import { startSettlementMonitor } from './services/settlement-monitor.js';
import { WeatherOutcomeClient } from './services/weather-client.js';

const validation = validateConfig();
if (!validation.valid) {
  console.error('Invalid configuration:');
  for (const error of validation.errors) console.error(`  - ${error}`);
  process.exit(1);
}

const service = createWagerService();
const app = createApp(service);

const server = app.listen(config.port, () => {
  console.log(`\n[Server] Listening on port ${config.port} (${config.nodeEnv})`);
});

const stopMonitor = startSettlementMonitor(service, WeatherOutcomeClient.fromConfig());

function shutdown(signal: string) {
  console.log(`\n[Server] ${signal} received, shutting down`);
  stopMonitor();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
