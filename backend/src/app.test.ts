/**
 * API Tests
 *
 * Drives the HTTP surface against an in-process server on an ephemeral port.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'node:http';
import axios, { type AxiosInstance } from 'axios';
import type { PublicKey } from 'o1js';
import { createApp } from './app.js';
import { TEST_WINDOW_MS, createTestService, newKey, type TestService } from './utils/test-helpers.js';

describe('API', () => {
  let t: TestService;
  let server: Server;
  let api: AxiosInstance;
  const [alice, bob, carol] = [newKey(), newKey(), newKey()];

  const asCaller = (caller: PublicKey) => ({ headers: { 'x-caller': caller.toBase58() } });

  before(async () => {
    t = createTestService();
    server = createApp(t.service).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));

    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    api = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });

    for (const bettor of [alice, bob, carol]) {
      const res = await api.post(`/api/admin/accounts/${bettor.toBase58()}/credit`, { amount: '1000' }, asCaller(t.operator));
      assert.strictEqual(res.status, 200);
    }
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('should require a caller for mutations', async () => {
    const res = await api.post('/api/events', {});
    assert.strictEqual(res.status, 401);
    assert.strictEqual(res.data.error, 'x-caller header is required');
  });

  it('should reserve event creation for operators', async () => {
    const res = await api.post('/api/events', {}, asCaller(alice));
    assert.strictEqual(res.status, 403);
    assert.strictEqual(res.data.code, 'Unauthorized');
  });

  it('should report no current event before the first one', async () => {
    const res = await api.get('/api/events/current');
    assert.strictEqual(res.status, 404);
  });

  it('should reject an invalid weather condition', async () => {
    const res = await api.post('/api/events', { condition: { kind: 'alert' } }, asCaller(t.operator));
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(res.data.errors, ['condition.location is required']);
  });

  it('should run an event from creation to claims', async () => {
    const created = await api.post(
      '/api/events',
      { condition: { kind: 'metric', location: 'Denver', metric: 'temp_c', threshold: 30 } },
      asCaller(t.operator)
    );
    assert.strictEqual(created.status, 201);
    assert.strictEqual(created.data.event.id, 1);
    assert.strictEqual(created.data.event.oddsA, '500');
    assert.strictEqual(created.data.event.bettingDeadline, String(1_700_000_000_000 + TEST_WINDOW_MS));
    assert.deepStrictEqual(created.data.event.condition, {
      kind: 'metric',
      location: 'Denver',
      metric: 'temp_c',
      threshold: 30,
    });

    assert.strictEqual((await api.post('/api/events/current/bets', { side: 'A', amount: '100' }, asCaller(alice))).status, 201);
    assert.strictEqual((await api.post('/api/events/current/bets', { side: 'A', amount: 200 }, asCaller(bob))).status, 201);
    const last = await api.post('/api/events/current/bets', { side: 'B', amount: '100' }, asCaller(carol));
    assert.strictEqual(last.status, 201);
    assert.strictEqual(last.data.event.oddsA, '250');
    assert.strictEqual(last.data.event.oddsB, '750');
    assert.deepStrictEqual(last.data.stake, {
      eventId: 1,
      address: carol.toBase58(),
      side: 'B',
      amount: '100',
      amountA: '0',
      amountB: '100',
      claimed: false,
    });

    const conflict = await api.post('/api/events/current/bets', { side: 'B', amount: '50' }, asCaller(alice));
    assert.strictEqual(conflict.status, 400);
    assert.strictEqual(conflict.data.code, 'SideConflict');

    const early = await api.post('/api/events/1/resolve', { outcome: true }, asCaller(t.operator));
    assert.strictEqual(early.status, 409);
    assert.strictEqual(early.data.code, 'WindowNotElapsed');

    t.clock.advance(TEST_WINDOW_MS);
    const resolved = await api.post('/api/events/1/resolve', { outcome: true }, asCaller(t.operator));
    assert.strictEqual(resolved.status, 200);
    assert.strictEqual(resolved.data.event.status, 'Resolved');
    assert.strictEqual(resolved.data.event.winningSide, 'A');

    const quote = await api.get(`/api/events/1/quote/${alice.toBase58()}`);
    assert.deepStrictEqual(quote.data, {
      success: true,
      claimable: true,
      quote: { stake: '100', grossPayout: '133', profit: '33', userShare: '117', charityShare: '16' },
    });

    const claim = await api.post('/api/events/1/claim', {}, asCaller(alice));
    assert.strictEqual(claim.status, 200);
    assert.strictEqual(claim.data.payout.userShare, '117');

    const again = await api.post('/api/events/1/claim', {}, asCaller(alice));
    assert.strictEqual(again.status, 409);
    assert.strictEqual(again.data.code, 'AlreadyClaimed');

    const loser = await api.post('/api/events/1/claim', {}, asCaller(carol));
    assert.strictEqual(loser.status, 409);
    assert.strictEqual(loser.data.code, 'NoWinningStake');

    const balance = await api.get(`/api/accounts/${alice.toBase58()}`);
    assert.strictEqual(balance.data.balance, '1017');
    const charity = await api.get(`/api/accounts/${t.charity.toBase58()}`);
    assert.strictEqual(charity.data.balance, '16');

    const event = await api.get('/api/events/1');
    assert.strictEqual(event.data.event.heldValue, '267');
    assert.strictEqual(event.data.event.participants, 3);
  });

  it('should map unknown and malformed ids', async () => {
    const unknown = await api.get('/api/events/9');
    assert.strictEqual(unknown.status, 404);
    assert.strictEqual(unknown.data.code, 'UnknownEvent');

    const quote = await api.get(`/api/events/9/quote/${alice.toBase58()}`);
    assert.strictEqual(quote.status, 404);
    assert.strictEqual(quote.data.code, 'UnknownEvent');

    assert.strictEqual((await api.get('/api/events/abc')).status, 400);
    assert.strictEqual((await api.get('/api/accounts/not-a-key')).status, 400);
  });

  it('should validate bet bodies', async () => {
    const side = await api.post('/api/events/current/bets', { side: 'C', amount: '10' }, asCaller(alice));
    assert.strictEqual(side.status, 400);
    assert.strictEqual(side.data.error, "side must be 'A' or 'B'");

    const amount = await api.post('/api/events/current/bets', { side: 'A', amount: '-5' }, asCaller(alice));
    assert.strictEqual(amount.status, 400);
    assert.strictEqual(amount.data.error, 'amount must be a non-negative integer');
  });

  it('should pause betting and allow an emergency withdrawal only while paused', async () => {
    const opened = await api.post('/api/events', {}, asCaller(t.operator));
    assert.strictEqual(opened.data.event.id, 2);

    const vault = newKey();
    const early = await api.post('/api/admin/emergency-withdraw', { recipient: vault.toBase58() }, asCaller(t.operator));
    assert.strictEqual(early.status, 409);
    assert.strictEqual(early.data.code, 'NotPaused');

    assert.strictEqual((await api.post('/api/admin/pause', {}, asCaller(alice))).status, 403);
    assert.strictEqual((await api.post('/api/admin/pause', {}, asCaller(t.operator))).status, 200);

    const bet = await api.post('/api/events/current/bets', { side: 'A', amount: '10' }, asCaller(alice));
    assert.strictEqual(bet.status, 409);
    assert.strictEqual(bet.data.code, 'SystemPaused');

    // Claims keep working while paused
    const claim = await api.post('/api/events/1/claim', {}, asCaller(bob));
    assert.strictEqual(claim.status, 200);
    assert.strictEqual(claim.data.payout.userShare, '233');

    const withdrawn = await api.post('/api/admin/emergency-withdraw', { recipient: vault.toBase58() }, asCaller(t.operator));
    assert.strictEqual(withdrawn.status, 200);
    assert.strictEqual(withdrawn.data.amount, '1');

    const status = await api.get('/api/admin/status');
    assert.deepStrictEqual(status.data, { success: true, paused: true, custodyBalance: '0', currentEventId: 2 });

    assert.strictEqual((await api.post('/api/admin/unpause', {}, asCaller(t.operator))).status, 200);
  });

  it('should cancel an event and refund its bettors', async () => {
    // Event 2 from the previous test is still open
    const bet = await api.post('/api/events/current/bets', { side: 'B', amount: '40' }, asCaller(carol));
    assert.strictEqual(bet.status, 201);

    const cancelled = await api.post('/api/events/2/cancel', {}, asCaller(t.operator));
    assert.strictEqual(cancelled.status, 200);
    assert.strictEqual(cancelled.data.event.status, 'Cancelled');
    assert.strictEqual(cancelled.data.event.heldValue, '0');

    const balance = await api.get(`/api/accounts/${carol.toBase58()}`);
    assert.strictEqual(balance.data.balance, '900');
  });
});
