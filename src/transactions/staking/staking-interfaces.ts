// Staking transaction payloads; amounts travel as decimal strings over JSON

export interface StakingStakeData {
    amount: string | bigint;
}

export interface StakingTransferFundsData {
    to: string;
    amount: string | bigint;
}

// claim, pause and unpause carry no payload
export type StakingEmptyData = Record<string, unknown> | undefined | null;
