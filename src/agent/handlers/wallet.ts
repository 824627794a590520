import type { BalanceSource } from '../../data/evm_balances.js';
import { normalizeEvmAddress } from '../../data/evm_balances.js';
import type { TransactionSource, WalletTransaction } from '../../data/evm_transactions.js';
import type { MemoryStore } from '../../memory/store.js';
import type { Requester } from '../types.js';
import type { IntentHandler } from './types.js';

const ADDRESS_SCAN = /\b0x[a-fA-F0-9]{40}\b/;
const TRACK_PATTERN = /\b(track|watch|follow|monitor|add|save)\b/i;
const LIST_PATTERN = /\b(my|tracked|list|show)\b.*\bwallets?\b/i;
const HISTORY_PATTERN = /\b(transactions?|txs?|history|activity|transfers?)\b/i;
const HISTORY_LIMIT = 5;
const NICKNAME_PATTERN = /\b(?:as|called|named|nickname)\s+"?([\w][\w\- ]{0,31}?)"?\s*$/i;

export const WALLET_USAGE =
  'Send me an EVM wallet address (0x followed by 40 hex characters) to look it up, ' +
  'or say "track 0x..." to follow it.';

export interface WalletHandlerDeps {
  network: string;
  balances: BalanceSource | null;
  transactions?: TransactionSource | null;
  memory: MemoryStore | null;
}

function shortAddress(address: string): string {
  return `${address.slice(0, 6)}…${address.slice(-4)}`;
}

function formatEth(value: number): string {
  return `${value.toLocaleString('en-US', { maximumFractionDigits: 4 })} ETH`;
}

function transactionLine(tx: WalletTransaction): string {
  const date = tx.timestamp === null ? 'unknown date' : new Date(tx.timestamp * 1000).toISOString().slice(0, 10);
  const amount = formatEth(tx.valueEth);
  switch (tx.direction) {
    case 'in':
      return `- ${date} received ${amount} from ${tx.counterparty ? shortAddress(tx.counterparty) : 'unknown'}`;
    case 'out':
      return tx.counterparty
        ? `- ${date} sent ${amount} to ${shortAddress(tx.counterparty)}`
        : `- ${date} deployed a contract with ${amount}`;
    case 'self':
      return `- ${date} moved ${amount} to itself`;
  }
}

export class WalletHandler implements IntentHandler {
  readonly intent = 'wallet' as const;

  constructor(private readonly deps: WalletHandlerDeps) {}

  async process(text: string, requester: Requester): Promise<string> {
    const match = text.match(ADDRESS_SCAN);
    const address = match ? normalizeEvmAddress(match[0]) : null;

    if (!address) {
      if (LIST_PATTERN.test(text)) {
        return this.listWallets(requester);
      }
      return WALLET_USAGE;
    }

    if (TRACK_PATTERN.test(text)) {
      return this.trackWallet(address, text, requester);
    }
    if (HISTORY_PATTERN.test(text)) {
      return this.describeTransactions(address);
    }
    return this.describeBalance(address);
  }

  private listWallets(requester: Requester): string {
    if (!this.deps.memory) {
      return 'Wallet tracking needs storage, which is turned off.';
    }
    const wallets = this.deps.memory.listWallets(requester.id);
    if (wallets.length === 0) {
      return `You are not tracking any wallets yet. ${WALLET_USAGE}`;
    }
    const lines = wallets.map(
      (wallet) => `- ${wallet.address} on ${wallet.network}${wallet.nickname ? ` (${wallet.nickname})` : ''}`
    );
    return [`You are tracking ${wallets.length} wallet(s):`, ...lines].join('\n');
  }

  private trackWallet(address: string, text: string, requester: Requester): string {
    if (!this.deps.memory) {
      return 'Wallet tracking needs storage, which is turned off.';
    }
    const nickname = text.match(NICKNAME_PATTERN)?.[1]?.trim() ?? null;
    const { created } = this.deps.memory.trackWallet({
      requesterId: requester.id,
      address,
      network: this.deps.network,
      nickname,
    });
    const label = nickname ? ` (${nickname})` : '';
    return created
      ? `Now tracking ${address}${label} on ${this.deps.network}.`
      : `Already tracking ${address}${label} on ${this.deps.network}; details updated.`;
  }

  private async describeBalance(address: string): Promise<string> {
    const balances = this.deps.balances;
    if (!balances) {
      return (
        `${address} is a valid ${this.deps.network} address, but balance lookups are not configured. ` +
        'Say "track" with the address to follow it.'
      );
    }
    const balance = await balances.getNativeBalance(address);
    return `Wallet ${shortAddress(address)} holds ${formatEth(balance)} on ${balances.network}.`;
  }

  private async describeTransactions(address: string): Promise<string> {
    const source = this.deps.transactions;
    if (!source) {
      return 'Transaction history needs an Etherscan API key, which is not configured.';
    }
    const transactions = await source.getRecentTransactions(address, HISTORY_LIMIT);
    if (transactions.length === 0) {
      return `No transactions found for ${shortAddress(address)} on ${source.network}.`;
    }
    return [
      `Recent transactions for ${shortAddress(address)} on ${source.network}:`,
      ...transactions.map(transactionLine),
    ].join('\n');
  }
}
