export enum TransactionType {
  // Staking Transactions
  STAKING_STAKE = 1,
  STAKING_CLAIM_REWARD = 2,
  STAKING_PAUSE = 3,
  STAKING_UNPAUSE = 4,
  STAKING_TRANSFER_FUNDS = 5,

  // Token Transactions
  TOKEN_TRANSFER = 10,
  TOKEN_APPROVE = 11,
  TOKEN_MINT = 12,
}

export const transactions: { [key: number]: string } = {
  [TransactionType.STAKING_STAKE]: 'staking_stake',
  [TransactionType.STAKING_CLAIM_REWARD]: 'staking_claim_reward',
  [TransactionType.STAKING_PAUSE]: 'staking_pause',
  [TransactionType.STAKING_UNPAUSE]: 'staking_unpause',
  [TransactionType.STAKING_TRANSFER_FUNDS]: 'staking_transfer_funds',

  [TransactionType.TOKEN_TRANSFER]: 'token_transfer',
  [TransactionType.TOKEN_APPROVE]: 'token_approve',
  [TransactionType.TOKEN_MINT]: 'token_mint',
};
