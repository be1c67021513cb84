/**
 * Pooled wagering engine - Main Export
 *
 * Two-sided pari-mutuel pools with pro-rata settlement, a fixed charity
 * split and full refunds on cancellation.
 */
export * from './contracts/index.js';
export * from './types/index.js';
export * from './utils/index.js';
