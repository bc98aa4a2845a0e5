export interface TokenTransferData {
    to: string;
    amount: string | bigint;
}

export interface TokenApproveData {
    spender: string;
    amount: string | bigint;
}

export interface TokenMintData {
    to: string;
    amount: string | bigint;
}
