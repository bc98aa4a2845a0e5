import config from '../config.js';

/**
 * Validates an account name: lowercase letters and digits, with '.' and '-' allowed
 * anywhere but the first and last position.
 */
const validateAccountName = (value: unknown): value is string => {
    if (typeof value !== 'string')
        return false;
    if (value.length < config.accountNameMinLength || value.length > config.accountNameMaxLength)
        return false;

    for (let i = 0; i < value.length; i++) {
        const ch = value[i];
        if (config.allowedUsernameChars.indexOf(ch) === -1)
            return false;
        if ((ch === '.' || ch === '-') && (i === 0 || i === value.length - 1))
            return false;
    }
    return true;
};

export default validateAccountName;
