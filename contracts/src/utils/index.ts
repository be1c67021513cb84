export * from './Capabilities.js';
export * from './LocalAccounts.js';
export * from './OutcomeOracle.js';
export * from './PoolMath.js';
