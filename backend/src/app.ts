/**
 * Express application
 */

import express from 'express';
import { createAccountsRouter, createAdminRouter } from './routes/admin.js';
import { createEventsRouter } from './routes/events.js';
import type { WagerService } from './services/wager-service.js';

export function createApp(service: WagerService) {
  const app = express();
  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({ success: true, status: 'ok' });
  });

  app.use('/api/events', createEventsRouter(service));
  app.use('/api/admin', createAdminRouter(service));
  app.use('/api/accounts', createAccountsRouter(service));

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: `No route for ${req.method} ${req.path}`,
    });
  });

  return app;
}
