import crypto from 'crypto';

/**
 * Deterministic hex id of `len` characters derived from the given parts.
 */
export function deterministicIdFrom(parts: Array<string | number | bigint>, len = 16): string {
    const joined = parts.map(p => String(p)).join('|');
    return crypto.createHash('sha256').update(joined).digest('hex').substring(0, len);
}

export default deterministicIdFrom;
