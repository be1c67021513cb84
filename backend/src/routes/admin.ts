/**
 * Admin and Accounts API Routes
 *
 * Pause switch, emergency withdrawal and the deposit gateway. Every admin
 * route requires an operator in x-caller.
 */

import express from 'express';
import type { WagerService } from '../services/wager-service.js';
import { parseAmount, parseCaller, parsePublicKey, readBody, sendError } from '../utils/http.js';

export function createAdminRouter(service: WagerService) {
  const router = express.Router();
  const { access, breaker } = service.local;

  /**
   * GET /api/admin/status
   */
  router.get('/status', (req, res) => {
    res.json({
      success: true,
      paused: breaker.isPaused(),
      custodyBalance: service.balanceOf(service.local.custody).toString(),
      currentEventId: service.engine.getCurrentEvent()?.id ?? null,
    });
  });

  /**
   * POST /api/admin/pause
   * Stops new bets; claims and refunds continue
   */
  router.post('/pause', (req, res) => {
    try {
      const operator = parseCaller(req);
      breaker.pause(operator);
      console.warn(`[Admin] Betting paused by ${operator.toBase58().slice(0, 12)}...`);
      res.json({ success: true, paused: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/admin/unpause
   */
  router.post('/unpause', (req, res) => {
    try {
      const operator = parseCaller(req);
      breaker.unpause(operator);
      console.log(`[Admin] Betting resumed by ${operator.toBase58().slice(0, 12)}...`);
      res.json({ success: true, paused: false });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/admin/emergency-withdraw
   * Drain custody to `recipient` while paused
   *
   * Request body:
   * {
   *   recipient: string   // base58 public key
   * }
   */
  router.post('/emergency-withdraw', (req, res) => {
    try {
      const operator = parseCaller(req);
      const recipient = parsePublicKey(readBody(req).recipient, 'recipient');
      const amount = service.engine.emergencyWithdraw(operator, recipient);
      res.json({
        success: true,
        recipient: recipient.toBase58(),
        amount: amount.toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/admin/accounts/:address/credit
   * Deposit gateway stand-in: mint `amount` to an account
   *
   * Request body:
   * {
   *   amount: string   // nanounits
   * }
   */
  router.post('/accounts/:address/credit', (req, res) => {
    try {
      access.requireOperator(parseCaller(req));
      const account = parsePublicKey(req.params.address, 'address');
      const amount = parseAmount(readBody(req).amount);
      service.accounts.credit(account, amount);
      res.json({
        success: true,
        address: account.toBase58(),
        balance: service.balanceOf(account).toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}

export function createAccountsRouter(service: WagerService) {
  const router = express.Router();

  /**
   * GET /api/accounts/:address
   */
  router.get('/:address', (req, res) => {
    try {
      const account = parsePublicKey(req.params.address, 'address');
      res.json({
        success: true,
        address: account.toBase58(),
        balance: service.balanceOf(account).toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
