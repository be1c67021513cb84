export * from './PoolLedger.js';
export * from './SettlementEngine.js';
export * from './createEngine.js';
