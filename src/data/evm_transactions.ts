import { ethers } from 'ethers';

import { withTimeout } from '../core/retry.js';

export type TransferDirection = 'in' | 'out' | 'self';

export interface WalletTransaction {
  hash: string;
  direction: TransferDirection;
  /** The other side of the transfer; null for contract creations. */
  counterparty: string | null;
  valueEth: number;
  /** Unix seconds, when the explorer reports it. */
  timestamp: number | null;
}

export interface TransactionSource {
  readonly network: string;
  /** Newest first. */
  getRecentTransactions(address: string, limit: number): Promise<WalletTransaction[]>;
}

type HistoryEntry = Pick<ethers.providers.TransactionResponse, 'hash' | 'from' | 'to' | 'value' | 'timestamp'>;

const NETWORK_ALIASES: Record<string, string> = {
  eth: 'homestead',
  ethereum: 'homestead',
  mainnet: 'homestead',
};

export function toWalletTransaction(entry: HistoryEntry, owner: string): WalletTransaction {
  const self = owner.toLowerCase();
  const from = entry.from.toLowerCase();
  const to = entry.to?.toLowerCase() ?? null;

  let direction: TransferDirection;
  let counterparty: string | null;
  if (from === self && to === self) {
    direction = 'self';
    counterparty = entry.from;
  } else if (from === self) {
    direction = 'out';
    counterparty = entry.to ?? null;
  } else {
    direction = 'in';
    counterparty = entry.from;
  }

  return {
    hash: entry.hash,
    direction,
    counterparty,
    valueEth: Number(ethers.utils.formatEther(entry.value)),
    timestamp: entry.timestamp ?? null,
  };
}

/** Account history through an Etherscan-backed provider. */
export class EtherscanTransactionSource implements TransactionSource {
  private readonly provider: ethers.providers.EtherscanProvider;

  constructor(
    apiKey: string,
    readonly network: string,
    private readonly timeoutMs: number
  ) {
    this.provider = new ethers.providers.EtherscanProvider(NETWORK_ALIASES[network] ?? network, apiKey);
  }

  async getRecentTransactions(address: string, limit: number): Promise<WalletTransaction[]> {
    const history = await withTimeout(
      () => this.provider.getHistory(address),
      this.timeoutMs,
      `transaction history for ${address}`
    );
    return history
      .slice(-Math.max(1, limit))
      .reverse()
      .map((entry) => toWalletTransaction(entry, address));
  }
}
