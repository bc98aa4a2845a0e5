const config = {
    tokenSymbol: 'LIME',
    tokenName: 'Lime Token',
    tokenDecimals: 18,
    tokenInitialSupply: '1000000000000000000000000000', // 1,000,000,000 LIME
    planDuration: 2592000, // 30 days
    interestRatePercent: 32,
    maxValue: '999999999999999999999999999999',
    allowedUsernameChars: 'abcdefghijklmnopqrstuvwxyz0123456789.-',
    accountNameMinLength: 3,
    accountNameMaxLength: 32,
    recentEventsBufferSize: 500,
};

export default config;
