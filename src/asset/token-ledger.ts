import logger from '../logger.js';
import { formatTokenAmount, setTokenDecimals } from '../utils/bigint.js';
import { logTransactionEvent } from '../utils/event-logger.js';
import { AssetLedger, TokenLedgerOptions, TokenMetadata } from './asset-interfaces.js';

/**
 * In-memory fungible token with allowance-based delegated transfers.
 * The whole initial supply is credited to the owner at creation.
 */
export class TokenLedger {
    readonly symbol: string;
    readonly name: string;
    readonly decimals: number;
    readonly owner: string;
    private supply: bigint;
    private readonly balances = new Map<string, bigint>();
    private readonly allowances = new Map<string, Map<string, bigint>>();

    constructor(options: TokenLedgerOptions) {
        if (options.initialSupply < 0n) {
            throw new Error(`Initial supply of ${options.symbol} cannot be negative`);
        }
        this.symbol = options.symbol;
        this.name = options.name;
        this.decimals = options.decimals;
        this.owner = options.owner;
        this.supply = options.initialSupply;
        if (options.initialSupply > 0n) {
            this.balances.set(options.owner, options.initialSupply);
        }
        setTokenDecimals(options.symbol, options.decimals);
    }

    get totalSupply(): bigint {
        return this.supply;
    }

    metadata(): TokenMetadata {
        return {
            symbol: this.symbol,
            name: this.name,
            decimals: this.decimals,
            totalSupply: this.supply,
            owner: this.owner,
        };
    }

    balanceOf(account: string): bigint {
        return this.balances.get(account) ?? 0n;
    }

    allowance(owner: string, spender: string): bigint {
        return this.allowances.get(owner)?.get(spender) ?? 0n;
    }

    /**
     * Sets (not adds to) the amount `spender` may move out of `owner`'s balance
     */
    async approve(owner: string, spender: string, amount: bigint): Promise<boolean> {
        if (amount < 0n) {
            logger.warn(`[token-ledger] Negative allowance ${amount} from ${owner} to ${spender} rejected.`);
            return false;
        }
        let granted = this.allowances.get(owner);
        if (!granted) {
            granted = new Map<string, bigint>();
            this.allowances.set(owner, granted);
        }
        granted.set(spender, amount);
        await logTransactionEvent('token', 'approve', owner, { symbol: this.symbol, spender, amount });
        return true;
    }

    async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
        if (!this.move(from, to, amount)) return false;
        await logTransactionEvent('token', 'transfer', from, { symbol: this.symbol, from, to, amount });
        return true;
    }

    /**
     * Moves `amount` from `from` to `to` on behalf of `spender`. The balance is checked
     * before the allowance; the allowance shrinks by the amount moved.
     */
    async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean> {
        const balance = this.balanceOf(from);
        if (balance < amount) {
            logger.warn(`[token-ledger] Insufficient balance for ${from}: ${formatTokenAmount(balance, this.symbol)} < ${formatTokenAmount(amount, this.symbol)} ${this.symbol}`);
            return false;
        }
        const allowed = this.allowance(from, spender);
        if (allowed < amount) {
            logger.warn(`[token-ledger] Insufficient allowance from ${from} to ${spender}: ${allowed} < ${amount}`);
            return false;
        }
        if (!this.move(from, to, amount)) return false;
        this.allowances.get(from)?.set(spender, allowed - amount);
        await logTransactionEvent('token', 'transfer', spender, { symbol: this.symbol, from, to, amount });
        return true;
    }

    async mint(caller: string, to: string, amount: bigint): Promise<boolean> {
        if (caller !== this.owner) {
            logger.warn(`[token-ledger] ${caller} is not the issuer of ${this.symbol} and cannot mint.`);
            return false;
        }
        if (amount <= 0n) {
            logger.warn(`[token-ledger] Mint amount must be positive, got ${amount}.`);
            return false;
        }
        this.supply += amount;
        this.balances.set(to, this.balanceOf(to) + amount);
        await logTransactionEvent('token', 'mint', caller, { symbol: this.symbol, to, amount, totalSupply: this.supply });
        return true;
    }

    /**
     * Asset ledger handle acting as `account`
     */
    connect(account: string): AssetLedger {
        return {
            symbol: this.symbol,
            account,
            balanceOf: async (target: string) => this.balanceOf(target),
            transferFrom: (from: string, to: string, amount: bigint) => this.transferFrom(account, from, to, amount),
            transfer: (to: string, amount: bigint) => this.transfer(account, to, amount),
        };
    }

    private move(from: string, to: string, amount: bigint): boolean {
        if (amount < 0n) {
            logger.warn(`[token-ledger] Negative transfer amount ${amount} from ${from} rejected.`);
            return false;
        }
        const balance = this.balanceOf(from);
        if (balance < amount) {
            logger.warn(`[token-ledger] Insufficient balance for ${from}: ${formatTokenAmount(balance, this.symbol)} < ${formatTokenAmount(amount, this.symbol)} ${this.symbol}`);
            return false;
        }
        this.balances.set(from, balance - amount);
        this.balances.set(to, this.balanceOf(to) + amount);
        logger.trace(`[token-ledger] ${from} -> ${to}: ${amount} ${this.symbol}`);
        return true;
    }
}

export default TokenLedger;
