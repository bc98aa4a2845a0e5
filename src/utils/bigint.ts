const TOKEN_DECIMALS: { [symbol: string]: number } = {};

/**
 * Register the decimal places of a token so amounts can be formatted for display
 */
export function setTokenDecimals(symbol: string, decimals: number): void {
    TOKEN_DECIMALS[symbol] = decimals;
}

/**
 * Decimal places of a token, 18 when unregistered
 */
export function getTokenDecimals(symbol: string): number {
    return TOKEN_DECIMALS[symbol] ?? 18;
}

/**
 * Convert a value to BigInt, handling null, undefined, and zero-padded string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return 0n;
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    const negative = value.startsWith('-');
    const digits = (negative ? value.slice(1) : value).replace(/^0+/, '') || '0';
    const parsed = BigInt(digits);
    return negative ? -parsed : parsed;
}

/**
 * Format a raw token amount with the token's decimal places, trimming trailing zeros
 * e.g. 1320000000000000000000n for an 18-decimal token -> "1320"
 */
export function formatTokenAmount(value: bigint, symbol: string): string {
    const decimals = getTokenDecimals(symbol);
    const negative = value < 0n;
    const abs = negative ? -value : value;
    if (decimals === 0) return (negative ? '-' : '') + abs.toString();

    const str = abs.toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, -decimals);
    const trimmedDecimal = str.slice(-decimals).replace(/0+$/, '');
    const formatted = trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
    return negative ? '-' + formatted : formatted;
}

/**
 * Integer percentage of an amount, truncated toward zero: floor(value * percent / 100) for value >= 0
 */
export function percentOf(value: bigint, percent: number): bigint {
    if (!Number.isSafeInteger(percent)) {
        throw new Error(`Percentage must be an integer, got ${percent}`);
    }
    return (value * BigInt(percent)) / 100n;
}

/**
 * JSON.stringify replacer rendering bigint values as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}
