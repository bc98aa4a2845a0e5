/**
 * Handle on a fungible asset ledger acting as a single account (the staking
 * ledger's custody). Transfers report success with a boolean and never throw
 * for an unsatisfiable amount.
 */
export interface AssetLedger {
    readonly symbol: string;
    /** Account this handle acts as */
    readonly account: string;
    balanceOf(account: string): Promise<bigint>;
    /** Moves `amount` from `from` to `to` using the allowance `from` granted to this handle's account */
    transferFrom(from: string, to: string, amount: bigint): Promise<boolean>;
    /** Moves `amount` out of this handle's own balance */
    transfer(to: string, amount: bigint): Promise<boolean>;
}

export interface TokenMetadata {
    symbol: string;
    name: string;
    decimals: number;
    totalSupply: bigint;
    owner: string;
}

export interface TokenLedgerOptions {
    symbol: string;
    name: string;
    decimals: number;
    owner: string;
    initialSupply: bigint;
}
