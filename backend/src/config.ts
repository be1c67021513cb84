/**
 * Configuration module - Centralized configuration management
 */

import dotenv from 'dotenv';
import { PublicKey, UInt64 } from 'o1js';

// Load environment variables
dotenv.config();

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export const config = {
  // Server
  port: parseInt(process.env.PORT || '3001'),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Identities (base58 public keys)
  operatorKeys: parseList(process.env.OPERATOR_KEYS),
  custodyAddress: process.env.CUSTODY_ADDRESS || '',
  // Receives half of each winner's profit; empty disables the split
  charityAddress: process.env.CHARITY_ADDRESS || '',

  // Wagering rules (amounts in nanounits, durations in ms)
  wagering: {
    bettingDurationMs: process.env.BETTING_DURATION_MS || '0',
    minBet: process.env.MIN_BET || '1',
    maxBet: process.env.MAX_BET || '0',
    publicResolution: process.env.PUBLIC_RESOLUTION === 'true',
  },

  // Weather outcome source
  weather: {
    apiUrl: process.env.WEATHER_API_URL || 'https://api.weatherapi.com/v1',
    apiKey: process.env.WEATHER_API_KEY || '',
  },

  // Settlement Monitor
  settlement: {
    checkInterval: parseInt(process.env.SETTLEMENT_CHECK_INTERVAL || '30000'),
  },
};

export type AppConfig = typeof config;

function isPublicKey(value: string): boolean {
  try {
    PublicKey.fromBase58(value);
    return true;
  } catch {
    return false;
  }
}

function isUnsignedInteger(value: string): boolean {
  return /^\d+$/.test(value) && BigInt(value) < 1n << 64n;
}

// '0', '00', ... all disable the setting
function isZero(value: string): boolean {
  return isUnsignedInteger(value) && BigInt(value) === 0n;
}

/**
 * Validate configuration
 */
export function validateConfig(current: AppConfig = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (current.operatorKeys.length === 0) {
    errors.push('OPERATOR_KEYS is required');
  }
  for (const key of current.operatorKeys) {
    if (!isPublicKey(key)) errors.push(`OPERATOR_KEYS entry ${key} is not a valid public key`);
  }

  if (!current.custodyAddress) {
    errors.push('CUSTODY_ADDRESS is required');
  } else if (!isPublicKey(current.custodyAddress)) {
    errors.push('CUSTODY_ADDRESS is not a valid public key');
  }

  if (current.charityAddress && !isPublicKey(current.charityAddress)) {
    errors.push('CHARITY_ADDRESS is not a valid public key');
  }

  const { bettingDurationMs, minBet, maxBet } = current.wagering;
  for (const [name, value] of [
    ['BETTING_DURATION_MS', bettingDurationMs],
    ['MIN_BET', minBet],
    ['MAX_BET', maxBet],
  ] as const) {
    if (!isUnsignedInteger(value)) errors.push(`${name} must be a non-negative integer`);
  }
  if (isUnsignedInteger(minBet) && isUnsignedInteger(maxBet) && !isZero(maxBet) && BigInt(maxBet) < BigInt(minBet)) {
    errors.push('MAX_BET must not be below MIN_BET');
  }

  if (isZero(bettingDurationMs)) {
    if (current.wagering.publicResolution) {
      console.warn('  PUBLIC_RESOLUTION has no effect without BETTING_DURATION_MS');
    }
    console.warn('  BETTING_DURATION_MS is 0 (weather-backed events will not settle automatically)');
  }

  if (!current.weather.apiKey) {
    console.warn('  WEATHER_API_KEY not set (weather-backed events cannot settle automatically)');
  }

  if (!Number.isFinite(current.settlement.checkInterval) || current.settlement.checkInterval <= 0) {
    errors.push('SETTLEMENT_CHECK_INTERVAL must be a positive number');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Get operator public keys
 */
export function getOperatorKeys(current: AppConfig = config): PublicKey[] {
  return current.operatorKeys.map((key) => PublicKey.fromBase58(key));
}

/**
 * Get custody address
 */
export function getCustodyAddress(current: AppConfig = config): PublicKey {
  return PublicKey.fromBase58(current.custodyAddress);
}

/**
 * Get charity address, or null when the split is disabled
 */
export function getCharityAddress(current: AppConfig = config): PublicKey | null {
  return current.charityAddress ? PublicKey.fromBase58(current.charityAddress) : null;
}

/**
 * Wagering rules as engine values. Zero duration and zero max bet mean "none".
 */
export function getWageringRules(current: AppConfig = config) {
  const { bettingDurationMs, minBet, maxBet, publicResolution } = current.wagering;
  return {
    bettingDurationMs: isZero(bettingDurationMs) ? null : UInt64.from(bettingDurationMs),
    minBet: UInt64.from(minBet),
    maxBet: isZero(maxBet) ? null : UInt64.from(maxBet),
    publicResolution,
  };
}
