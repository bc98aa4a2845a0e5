import assert from 'assert';
import { describe, it } from 'node:test';

import { OwnerPauseGate } from '../src/access/access-gate.js';
import { StakingErrorKind } from '../src/staking/staking-errors.js';

describe('OwnerPauseGate', () => {
    it('starts running unless told otherwise', () => {
        assert.strictEqual(new OwnerPauseGate('owner').isPaused(), false);
        assert.strictEqual(new OwnerPauseGate('owner', true).isPaused(), true);
    });

    it('requires an owner', () => {
        assert.throws(() => new OwnerPauseGate(''), /requires an owner/);
    });

    it('only lets the owner toggle the pause flag', () => {
        const gate = new OwnerPauseGate('owner');
        assert.deepStrictEqual(gate.setPaused('alice', true), {
            success: false,
            error: StakingErrorKind.Unauthorized,
            message: 'caller is not the owner',
        });
        assert.strictEqual(gate.isPaused(), false);

        assert.strictEqual(gate.setPaused('owner', true).success, true);
        assert.strictEqual(gate.isPaused(), true);
        assert.strictEqual(gate.setPaused('owner', false).success, true);
        assert.strictEqual(gate.isPaused(), false);
    });

    it('rejects redundant transitions', () => {
        const gate = new OwnerPauseGate('owner');
        const unpause = gate.setPaused('owner', false);
        assert.strictEqual(unpause.success, false);
        if (!unpause.success) assert.strictEqual(unpause.error, StakingErrorKind.NotPaused);

        gate.setPaused('owner', true);
        const pause = gate.setPaused('owner', true);
        assert.strictEqual(pause.success, false);
        if (!pause.success) assert.strictEqual(pause.error, StakingErrorKind.Paused);
        assert.strictEqual(gate.isPaused(), true);
    });

    it('checks ownership before state', () => {
        const gate = new OwnerPauseGate('owner', true);
        const result = gate.setPaused('mallory', true);
        assert.strictEqual(result.success, false);
        if (!result.success) assert.strictEqual(result.error, StakingErrorKind.Unauthorized);
    });
});
