import assert from 'assert';
import { describe, it } from 'node:test';

import { computeReward } from '../src/staking/staking-ledger.js';
import { formatTokenAmount, percentOf, setTokenDecimals, toBigInt } from '../src/utils/bigint.js';

describe('computeReward', () => {
    it('applies the rate to the principal', () => {
        assert.strictEqual(computeReward(1000n, 32), 320n);
        assert.strictEqual(computeReward(1000n * 10n ** 18n, 32), 320n * 10n ** 18n);
    });

    it('truncates fractional rewards', () => {
        assert.strictEqual(computeReward(999n, 32), 319n);
        assert.strictEqual(computeReward(3n, 32), 0n);
        assert.strictEqual(computeReward(4n, 32), 1n);
    });

    it('handles zero and full rates', () => {
        assert.strictEqual(computeReward(1234n, 0), 0n);
        assert.strictEqual(computeReward(1234n, 100), 1234n);
        assert.strictEqual(computeReward(0n, 32), 0n);
    });

    it('rejects fractional percentages', () => {
        assert.throws(() => percentOf(100n, 1.5), /Percentage must be an integer/);
    });
});

describe('bigint utils', () => {
    it('toBigInt strips zero padding and keeps the sign', () => {
        assert.strictEqual(toBigInt('000123'), 123n);
        assert.strictEqual(toBigInt('-0005'), -5n);
        assert.strictEqual(toBigInt('0000'), 0n);
        assert.strictEqual(toBigInt(undefined), 0n);
        assert.strictEqual(toBigInt(12.7), 12n);
    });

    it('formatTokenAmount trims trailing zeros', () => {
        setTokenDecimals('TSIX', 6);
        setTokenDecimals('TZERO', 0);
        assert.strictEqual(formatTokenAmount(1500000n, 'TSIX'), '1.5');
        assert.strictEqual(formatTokenAmount(5n, 'TSIX'), '0.000005');
        assert.strictEqual(formatTokenAmount(2000000n, 'TSIX'), '2');
        assert.strictEqual(formatTokenAmount(42n, 'TZERO'), '42');
        assert.strictEqual(formatTokenAmount(1320n * 10n ** 18n, 'UNREGISTERED'), '1320');
        assert.strictEqual(formatTokenAmount(-1500000n, 'TSIX'), '-1.5');
    });
});
