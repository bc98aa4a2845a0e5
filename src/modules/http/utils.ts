import { Request } from 'express';

import { StakingErrorKind } from '../../staking/staking-errors.js';
import { formatTokenAmount, toBigInt } from '../../utils/bigint.js';

/**
 * Get pagination parameters from request query
 * @returns Object with limit (1 to 100), skip (never negative), and page properties
 */
export const getPagination = (req: Pick<Request, 'query'>) => {
    const limit = Math.min(Math.max(parseInt(String(req.query.limit)) || 10, 1), 100);
    const offset = Math.max(parseInt(String(req.query.offset)) || 0, 0);
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

/**
 * Formats a token amount for HTTP response with both formatted and raw values
 */
export function formatTokenAmountForResponse(amount: string | bigint, symbol: string): {
    amount: string; // e.g. "1320.5"
    rawAmount: string; // smallest units, e.g. "1320500000000000000000"
} {
    const bigIntAmount = toBigInt(amount);
    return {
        amount: formatTokenAmount(bigIntAmount, symbol),
        rawAmount: bigIntAmount.toString(),
    };
}

export function statusForKind(kind: StakingErrorKind | undefined): number {
    switch (kind) {
        case undefined:
            return 400;
        case StakingErrorKind.Unauthorized:
            return 403;
        case StakingErrorKind.NotParticipant:
            return 404;
        default:
            return 409;
    }
}

export function queryString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}
