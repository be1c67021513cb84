import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { config, getCharityAddress, getWageringRules, validateConfig, type AppConfig } from './config.js';
import { newKey } from './utils/test-helpers.js';

function withWagering(wagering: Partial<AppConfig['wagering']>, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...config,
    operatorKeys: [newKey().toBase58()],
    custodyAddress: newKey().toBase58(),
    charityAddress: '',
    weather: { ...config.weather, apiKey: 'test-key' },
    settlement: { checkInterval: 30_000 },
    ...overrides,
    wagering: { bettingDurationMs: '60000', minBet: '1', maxBet: '0', publicResolution: false, ...wagering },
  };
}

describe('config', () => {
  let warnings: string[];

  beforeEach(() => {
    warnings = [];
    mock.method(console, 'warn', (message: string) => {
      warnings.push(message);
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('getWageringRules', () => {
    it('should map zero window and max bet to null', () => {
      const rules = getWageringRules(withWagering({ bettingDurationMs: '0', maxBet: '0' }));
      assert.strictEqual(rules.bettingDurationMs, null);
      assert.strictEqual(rules.maxBet, null);
      assert.strictEqual(rules.minBet.toString(), '1');
    });

    it('should read zero written with leading zeros as zero', () => {
      const rules = getWageringRules(withWagering({ bettingDurationMs: '00', maxBet: '000' }));
      assert.strictEqual(rules.bettingDurationMs, null);
      assert.strictEqual(rules.maxBet, null);
    });

    it('should keep positive values', () => {
      const rules = getWageringRules(withWagering({ bettingDurationMs: '060000', maxBet: '500', minBet: '10' }));
      assert.strictEqual(rules.bettingDurationMs?.toString(), '60000');
      assert.strictEqual(rules.maxBet?.toString(), '500');
      assert.strictEqual(rules.minBet.toString(), '10');
    });
  });

  describe('validateConfig', () => {
    it('should accept a complete configuration without warnings', () => {
      assert.deepStrictEqual(validateConfig(withWagering({})), { valid: true, errors: [] });
      assert.deepStrictEqual(warnings, []);
    });

    it('should warn that a zero window stops automatic settlement', () => {
      const result = validateConfig(withWagering({ bettingDurationMs: '00', publicResolution: true }));

      assert.strictEqual(result.valid, true);
      assert.deepStrictEqual(warnings, [
        '  PUBLIC_RESOLUTION has no effect without BETTING_DURATION_MS',
        '  BETTING_DURATION_MS is 0 (weather-backed events will not settle automatically)',
      ]);
    });

    it('should reject a max bet below the min bet', () => {
      const result = validateConfig(withWagering({ minBet: '100', maxBet: '50' }));
      assert.deepStrictEqual(result.errors, ['MAX_BET must not be below MIN_BET']);
    });

    it('should not compare against an unbounded max bet', () => {
      assert.strictEqual(validateConfig(withWagering({ minBet: '100', maxBet: '00' })).valid, true);
    });

    it('should reject malformed numbers and keys', () => {
      const result = validateConfig(
        withWagering({ bettingDurationMs: '1h', minBet: '-1' }, { operatorKeys: [], custodyAddress: 'custody' })
      );
      assert.deepStrictEqual(result.errors, [
        'OPERATOR_KEYS is required',
        'CUSTODY_ADDRESS is not a valid public key',
        'BETTING_DURATION_MS must be a non-negative integer',
        'MIN_BET must be a non-negative integer',
      ]);
    });
  });

  it('should disable the charity split when no address is set', () => {
    assert.strictEqual(getCharityAddress(withWagering({})), null);
    const charity = newKey();
    assert.strictEqual(getCharityAddress(withWagering({}, { charityAddress: charity.toBase58() }))?.toBase58(), charity.toBase58());
  });
});
