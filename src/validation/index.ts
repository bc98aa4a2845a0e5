import accountName from './account.js';
import bigint from './bigint.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    accountName: (value: unknown) => value is string;
    bigint: (value: unknown, allowZero?: boolean, allowNegative?: boolean, minValue?: bigint) => boolean;
}

const validation: ValidationModule = {
    accountName,
    bigint,
};

export default validation;
