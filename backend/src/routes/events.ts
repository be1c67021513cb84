/**
 * Events API Routes
 */

import express from 'express';
import { isSide } from '@pooled-wager/contracts';
import type { WagerService } from '../services/wager-service.js';
import { validateWeatherCondition, type WeatherCondition } from '../services/weather-client.js';
import {
  RequestError,
  parseAmount,
  parseCaller,
  parseEventId,
  parsePublicKey,
  readBody,
  sendError,
} from '../utils/http.js';

export function createEventsRouter(service: WagerService) {
  const router = express.Router();

  /**
   * GET /api/events
   * All events, oldest first
   */
  router.get('/', (req, res) => {
    try {
      const events = service.engine.listEvents().map((event) => service.toEventView(event));
      res.json({
        success: true,
        count: events.length,
        events,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/events/current
   * Most recently created event
   */
  router.get('/current', (req, res) => {
    try {
      const event = service.engine.getCurrentEvent();
      if (!event) {
        return res.status(404).json({
          success: false,
          error: 'No event has been created',
        });
      }
      res.json({
        success: true,
        event: service.toEventView(event),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/events/:id
   */
  router.get('/:id', (req, res) => {
    try {
      const event = service.engine.getEvent(parseEventId(req.params.id));
      res.json({
        success: true,
        event: service.toEventView(event),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/events/:id/stakes/:address
   */
  router.get('/:id/stakes/:address', (req, res) => {
    try {
      const eventId = parseEventId(req.params.id);
      service.engine.getEvent(eventId);
      const stake = service.toStakeView(eventId, parsePublicKey(req.params.address, 'address'));
      res.json({
        success: true,
        stake,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/events/:id/quote/:address
   * What the address would receive by claiming now
   */
  router.get('/:id/quote/:address', (req, res) => {
    try {
      const eventId = parseEventId(req.params.id);
      service.engine.getEvent(eventId);
      const quote = service.engine.quotePayout(eventId, parsePublicKey(req.params.address, 'address'));
      res.json({
        success: true,
        claimable: quote !== null,
        quote: quote ? service.toQuoteView(quote) : null,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/events
   * Open the next event (operator only)
   *
   * Request body (optional):
   * {
   *   condition: { kind: 'metric', location, metric, threshold } | { kind: 'alert', location }
   * }
   * Events without a condition are resolved manually.
   */
  router.post('/', (req, res) => {
    try {
      const operator = parseCaller(req);
      const body = readBody(req);

      let condition: WeatherCondition | undefined;
      if (body.condition !== undefined) {
        const validation = validateWeatherCondition(body.condition);
        if (!validation.valid || !validation.condition) {
          return res.status(400).json({
            success: false,
            errors: validation.errors,
          });
        }
        condition = validation.condition;
      }

      const event = service.createEvent(operator, condition);
      res.status(201).json({
        success: true,
        event: service.toEventView(event),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/events/current/bets
   *
   * Request body:
   * {
   *   side: 'A' | 'B',
   *   amount: string   // nanounits
   * }
   */
  router.post('/current/bets', (req, res) => {
    try {
      const caller = parseCaller(req);
      const { side, amount } = readBody(req);
      if (!isSide(side)) {
        throw new RequestError("side must be 'A' or 'B'");
      }

      const event = service.engine.placeBet(caller, side, parseAmount(amount));
      res.status(201).json({
        success: true,
        event: service.toEventView(event),
        stake: service.toStakeView(event.id, caller),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/events/:id/resolve
   *
   * Request body (operators only, optional):
   * {
   *   outcome: boolean   // true: side A wins
   * }
   * Without an outcome the oracle decides.
   */
  router.post('/:id/resolve', (req, res) => {
    try {
      const caller = parseCaller(req);
      const eventId = parseEventId(req.params.id);
      const { outcome } = readBody(req);
      if (outcome !== undefined && typeof outcome !== 'boolean') {
        throw new RequestError('outcome must be a boolean');
      }

      const event = service.engine.resolveEvent(caller, eventId, typeof outcome === 'boolean' ? outcome : undefined);
      res.json({
        success: true,
        event: service.toEventView(event),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/events/:id/cancel
   * Cancel and refund every participant (operator only)
   */
  router.post('/:id/cancel', (req, res) => {
    try {
      const operator = parseCaller(req);
      const event = service.engine.cancelEvent(operator, parseEventId(req.params.id));
      res.json({
        success: true,
        event: service.toEventView(event),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/events/:id/claim
   */
  router.post('/:id/claim', (req, res) => {
    try {
      const caller = parseCaller(req);
      const quote = service.engine.claimWinnings(caller, parseEventId(req.params.id));
      res.json({
        success: true,
        payout: service.toQuoteView(quote),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
