import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ethers } from 'ethers';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { WALLET_USAGE, WalletHandler } from '../../../src/agent/handlers/wallet.js';
import type { BalanceSource } from '../../../src/data/evm_balances.js';
import { normalizeEvmAddress } from '../../../src/data/evm_balances.js';
import {
  toWalletTransaction,
  type TransactionSource,
  type WalletTransaction,
} from '../../../src/data/evm_transactions.js';
import { closeDatabase } from '../../../src/memory/db.js';
import { SqliteMemoryStore } from '../../../src/memory/store.js';

const WALLET = '0x52908400098527886E0F7030069857D2E4169EE7';
const OTHER = '0xAb5801a7D398351b8bE11C439e05C5B3259aeC9B';
const MARCH_1 = 1_772_323_200;
const requester = { id: 'u1', name: 'alice' };
const originalDbPath = process.env.TRADEWATCH_DB_PATH;

function setIsolatedDbPath(name: string): void {
  const dir = mkdtempSync(join(tmpdir(), `tradewatch-${name}-`));
  process.env.TRADEWATCH_DB_PATH = join(dir, 'tradewatch.sqlite');
}

afterEach(() => {
  closeDatabase();
  if (originalDbPath === undefined) {
    delete process.env.TRADEWATCH_DB_PATH;
  } else {
    process.env.TRADEWATCH_DB_PATH = originalDbPath;
  }
});

describe('normalizeEvmAddress', () => {
  it('checksums any-case addresses and rejects malformed ones', () => {
    expect(normalizeEvmAddress(WALLET.toLowerCase())).toBe(WALLET);
    expect(normalizeEvmAddress('0x1234')).toBeNull();
    expect(normalizeEvmAddress('not an address')).toBeNull();
  });
});

describe('WalletHandler', () => {
  it('explains usage when there is no address', async () => {
    const handler = new WalletHandler({ network: 'eth', balances: null, memory: null });
    await expect(handler.process('check a wallet for me', requester)).resolves.toBe(WALLET_USAGE);
  });

  it('reports a native balance', async () => {
    const balances: BalanceSource = { network: 'eth', getNativeBalance: vi.fn(async () => 1.23456) };
    const handler = new WalletHandler({ network: 'eth', balances, memory: null });

    await expect(handler.process(`balance of ${WALLET.toLowerCase()}?`, requester)).resolves.toBe(
      'Wallet 0x5290…9EE7 holds 1.2346 ETH on eth.'
    );
    expect(balances.getNativeBalance).toHaveBeenCalledWith(WALLET);
  });

  it('validates the address when no balance source is configured', async () => {
    const handler = new WalletHandler({ network: 'eth', balances: null, memory: null });
    await expect(handler.process(WALLET, requester)).resolves.toBe(
      `${WALLET} is a valid eth address, but balance lookups are not configured. Say "track" with the address to follow it.`
    );
  });

  it('tracks and lists wallets', async () => {
    setIsolatedDbPath('wallet-handler');
    const handler = new WalletHandler({ network: 'eth', balances: null, memory: new SqliteMemoryStore() });

    await expect(handler.process(`track ${WALLET} as main`, requester)).resolves.toBe(
      `Now tracking ${WALLET} (main) on eth.`
    );
    await expect(handler.process(`track ${WALLET}`, requester)).resolves.toBe(
      `Already tracking ${WALLET} on eth; details updated.`
    );
    await expect(handler.process('show my wallets', requester)).resolves.toBe(
      `You are tracking 1 wallet(s):\n- ${WALLET} on eth (main)`
    );
  });

  it('says tracking needs storage when memory is off', async () => {
    const handler = new WalletHandler({ network: 'eth', balances: null, memory: null });
    await expect(handler.process(`watch ${WALLET}`, requester)).resolves.toBe(
      'Wallet tracking needs storage, which is turned off.'
    );
  });
});

describe('toWalletTransaction', () => {
  it('classifies direction against the owner regardless of case', () => {
    const value = ethers.BigNumber.from('1500000000000000000');

    const incoming = { hash: '0x01', from: OTHER, to: WALLET, value, timestamp: MARCH_1 };
    expect(toWalletTransaction(incoming, WALLET.toLowerCase())).toEqual({
      hash: '0x01',
      direction: 'in',
      counterparty: OTHER,
      valueEth: 1.5,
      timestamp: MARCH_1,
    });
    expect(toWalletTransaction({ hash: '0x02', from: WALLET.toLowerCase(), to: OTHER, value }, WALLET)).toMatchObject({
      direction: 'out',
      counterparty: OTHER,
      timestamp: null,
    });
    expect(toWalletTransaction({ hash: '0x03', from: WALLET, value }, WALLET)).toMatchObject({
      direction: 'out',
      counterparty: null,
    });
    expect(toWalletTransaction({ hash: '0x04', from: WALLET, to: WALLET, value }, WALLET)).toMatchObject({
      direction: 'self',
    });
  });
});

describe('WalletHandler transactions', () => {
  function transactionSource(transactions: WalletTransaction[]) {
    const getRecentTransactions = vi.fn(async () => transactions);
    const source: TransactionSource = { network: 'eth', getRecentTransactions };
    return { source, getRecentTransactions };
  }

  it('lists recent transfers newest first', async () => {
    const { source, getRecentTransactions } = transactionSource([
      { hash: '0x04', direction: 'in', counterparty: OTHER, valueEth: 0.5, timestamp: MARCH_1 + 86_400 },
      { hash: '0x03', direction: 'out', counterparty: OTHER, valueEth: 1.25, timestamp: MARCH_1 },
      { hash: '0x02', direction: 'out', counterparty: null, valueEth: 0, timestamp: MARCH_1 },
      { hash: '0x01', direction: 'self', counterparty: WALLET, valueEth: 2, timestamp: null },
    ]);
    const handler = new WalletHandler({ network: 'eth', balances: null, transactions: source, memory: null });

    await expect(handler.process(`show recent transactions for ${WALLET}`, requester)).resolves.toBe(
      [
        'Recent transactions for 0x5290…9EE7 on eth:',
        '- 2026-03-02 received 0.5 ETH from 0xAb58…eC9B',
        '- 2026-03-01 sent 1.25 ETH to 0xAb58…eC9B',
        '- 2026-03-01 deployed a contract with 0 ETH',
        '- unknown date moved 2 ETH to itself',
      ].join('\n')
    );
    expect(getRecentTransactions).toHaveBeenCalledWith(WALLET, 5);
  });

  it('reports an empty history', async () => {
    const { source } = transactionSource([]);
    const handler = new WalletHandler({ network: 'eth', balances: null, transactions: source, memory: null });
    await expect(handler.process(`${WALLET} tx history`, requester)).resolves.toBe(
      'No transactions found for 0x5290…9EE7 on eth.'
    );
  });

  it('explains that history needs an explorer key', async () => {
    const handler = new WalletHandler({ network: 'eth', balances: null, memory: null });
    await expect(handler.process(`activity on ${WALLET}`, requester)).resolves.toBe(
      'Transaction history needs an Etherscan API key, which is not configured.'
    );
  });
});
