import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';

import { StakingErrorKind } from '../src/staking/staking-errors.js';
import { Transaction, parseTransaction, processTransaction } from '../src/transactions/index.js';
import { TransactionType } from '../src/transactions/types.js';
import { Fixture, PLAN_DURATION, STAKE_AMOUNT, T0, UNIT, deployFixture } from './helpers.js';

let counter = 0;
function tx(type: TransactionType, sender: string, data?: unknown): Transaction {
    counter += 1;
    return { type, sender, data, id: `tx-${counter}` };
}

describe('parseTransaction', () => {
    it('accepts numeric types and type names', () => {
        assert.deepStrictEqual(parseTransaction({ type: 1, sender: 'alice', id: 'a1', data: { amount: '5' } }), {
            type: TransactionType.STAKING_STAKE,
            sender: 'alice',
            id: 'a1',
            data: { amount: '5' },
        });
        assert.strictEqual(parseTransaction({ type: 'STAKING_CLAIM_REWARD', sender: 'alice', id: 'a2' })?.type, TransactionType.STAKING_CLAIM_REWARD);
    });

    it('rejects malformed envelopes', () => {
        assert.strictEqual(parseTransaction(null), null);
        assert.strictEqual(parseTransaction([1]), null);
        assert.strictEqual(parseTransaction({ type: 99, sender: 'alice', id: 'x' }), null);
        assert.strictEqual(parseTransaction({ type: 'staking_stake', sender: 'alice', id: 'x' }), null);
        assert.strictEqual(parseTransaction({ type: 1, sender: 'alice' }), null);
        assert.strictEqual(parseTransaction({ type: 1, sender: 'alice', id: '' }), null);
        assert.strictEqual(parseTransaction({ type: 1, sender: 7, id: 'x' }), null);
    });
});

describe('processTransaction', () => {
    let f: Fixture;

    beforeEach(async () => {
        f = await deployFixture();
    });

    it('runs a full stake and claim cycle', async () => {
        const approve = await processTransaction(
            tx(TransactionType.TOKEN_APPROVE, 'alice', { spender: 'staking-custody', amount: STAKE_AMOUNT.toString() }),
            f
        );
        assert.deepStrictEqual(approve, {
            success: true,
            result: { owner: 'alice', spender: 'staking-custody', amount: STAKE_AMOUNT },
        });

        const stake = await processTransaction(tx(TransactionType.STAKING_STAKE, 'alice', { amount: STAKE_AMOUNT.toString() }), f);
        assert.deepStrictEqual(stake, {
            success: true,
            result: { startTime: T0, maturityTime: T0 + PLAN_DURATION, principal: STAKE_AMOUNT, claimed: false },
        });

        f.clock.advance(PLAN_DURATION);
        const claim = await processTransaction(tx(TransactionType.STAKING_CLAIM_REWARD, 'alice'), f);
        assert.deepStrictEqual(claim, {
            success: true,
            result: { principal: STAKE_AMOUNT, reward: 320n * UNIT, payout: 1320n * UNIT },
        });
    });

    it('carries the ledger rejection kind and message', async () => {
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.STAKING_STAKE, 'bob', { amount: '0' }), f), {
            success: false,
            error: 'stake amount must be positive, got 0',
            kind: StakingErrorKind.InvalidAmount,
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.STAKING_CLAIM_REWARD, 'bob'), f), {
            success: false,
            error: 'bob has not participated',
            kind: StakingErrorKind.NotParticipant,
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.STAKING_PAUSE, 'alice'), f), {
            success: false,
            error: 'caller is not the owner',
            kind: StakingErrorKind.Unauthorized,
        });
    });

    it('reports an immature claim with its maturity time', async () => {
        await f.token.approve('alice', 'staking-custody', STAKE_AMOUNT);
        await processTransaction(tx(TransactionType.STAKING_STAKE, 'alice', { amount: STAKE_AMOUNT.toString() }), f);
        const claim = await processTransaction(tx(TransactionType.STAKING_CLAIM_REWARD, 'alice'), f);
        assert.deepStrictEqual(claim, {
            success: false,
            error: `stake matures at ${T0 + PLAN_DURATION}, now ${T0}`,
            kind: StakingErrorKind.NotMatured,
        });
    });

    it('lets the owner pause, unpause and move custody funds', async () => {
        assert.strictEqual((await processTransaction(tx(TransactionType.STAKING_PAUSE, 'owner'), f)).success, true);
        assert.strictEqual(f.ledger.isPaused(), true);

        const moved = await processTransaction(
            tx(TransactionType.STAKING_TRANSFER_FUNDS, 'owner', { to: 'bob', amount: UNIT.toString() }),
            f
        );
        assert.strictEqual(moved.success, true);
        assert.strictEqual(f.token.balanceOf('bob'), STAKE_AMOUNT * 100n + UNIT);

        assert.strictEqual((await processTransaction(tx(TransactionType.STAKING_UNPAUSE, 'owner', {}), f)).success, true);
        assert.strictEqual(f.ledger.isPaused(), false);
    });

    it('rejects bad envelopes and payloads before touching the ledger', async () => {
        assert.deepStrictEqual(await processTransaction({ type: TransactionType.STAKING_STAKE, sender: '', id: 'e1' }, f), {
            success: false,
            error: 'invalid transaction: missing required fields',
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.STAKING_STAKE, 'Alice', { amount: '1' }), f), {
            success: false,
            error: 'invalid transaction: invalid sender',
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.STAKING_STAKE, 'alice', { amount: '1.5' }), f), {
            success: false,
            error: 'invalid staking_stake transaction data',
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.STAKING_PAUSE, 'owner', ['x']), f), {
            success: false,
            error: 'invalid staking_pause transaction data',
        });
        assert.deepStrictEqual(
            await processTransaction(tx(TransactionType.STAKING_TRANSFER_FUNDS, 'owner', { to: 'Bad Name', amount: '1' }), f),
            { success: false, error: 'invalid staking_transfer_funds transaction data' }
        );
        assert.strictEqual(f.ledger.isPaused(), false);
    });

    it('handles token transfers and mints', async () => {
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.TOKEN_TRANSFER, 'alice', { to: 'carol', amount: '5' }), f), {
            success: true,
            result: { from: 'alice', to: 'carol', amount: 5n },
        });
        assert.strictEqual(f.token.balanceOf('carol'), 5n);

        assert.deepStrictEqual(await processTransaction(tx(TransactionType.TOKEN_TRANSFER, 'carol', { to: 'alice', amount: '6' }), f), {
            success: false,
            error: 'insufficient LIME balance',
            kind: StakingErrorKind.InsufficientFunds,
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.TOKEN_TRANSFER, 'alice', { to: 'alice', amount: '1' }), f), {
            success: false,
            error: 'invalid token_transfer transaction data',
        });

        assert.deepStrictEqual(await processTransaction(tx(TransactionType.TOKEN_MINT, 'alice', { to: 'alice', amount: '1' }), f), {
            success: false,
            error: 'only the issuer can mint',
            kind: StakingErrorKind.Unauthorized,
        });
        assert.deepStrictEqual(await processTransaction(tx(TransactionType.TOKEN_MINT, 'owner', { to: 'carol', amount: '7' }), f), {
            success: true,
            result: { to: 'carol', amount: 7n, totalSupply: STAKE_AMOUNT * 1000n + 7n },
        });
    });

    it('refuses every transaction sent as the custody account', async () => {
        await f.token.approve('alice', 'staking-custody', STAKE_AMOUNT);
        await processTransaction(tx(TransactionType.STAKING_STAKE, 'alice', { amount: STAKE_AMOUNT.toString() }), f);
        const custodyBalance = f.token.balanceOf('staking-custody');
        const rejected = {
            success: false,
            error: 'invalid transaction: custody account cannot send transactions',
            kind: StakingErrorKind.Unauthorized,
        };

        assert.deepStrictEqual(
            await processTransaction(tx(TransactionType.TOKEN_TRANSFER, 'staking-custody', { to: 'mallory', amount: custodyBalance.toString() }), f),
            rejected
        );
        assert.deepStrictEqual(
            await processTransaction(tx(TransactionType.TOKEN_APPROVE, 'staking-custody', { spender: 'mallory', amount: custodyBalance.toString() }), f),
            rejected
        );
        assert.deepStrictEqual(
            await processTransaction(tx(TransactionType.STAKING_STAKE, 'staking-custody', { amount: '1' }), f),
            rejected
        );

        assert.strictEqual(f.token.balanceOf('staking-custody'), custodyBalance);
        assert.strictEqual(f.token.balanceOf('mallory'), 0n);
        assert.strictEqual(f.token.allowance('staking-custody', 'mallory'), 0n);
        assert.strictEqual(f.ledger.hasStaked('staking-custody'), false);
    });
});
