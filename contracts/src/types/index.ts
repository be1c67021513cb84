export * from './Constants.js';
export * from './EventInfo.js';
export * from './StakeRecord.js';
export * from './WagerError.js';
