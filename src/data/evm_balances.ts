import { ethers } from 'ethers';

import { withTimeout } from '../core/retry.js';

export interface BalanceSource {
  readonly network: string;
  /** Native balance in ether units. */
  getNativeBalance(address: string): Promise<number>;
}

export class RpcBalanceSource implements BalanceSource {
  private readonly provider: ethers.providers.JsonRpcProvider;

  constructor(
    rpcUrl: string,
    readonly network: string,
    private readonly timeoutMs: number
  ) {
    this.provider = new ethers.providers.JsonRpcProvider(rpcUrl);
  }

  async getNativeBalance(address: string): Promise<number> {
    const raw = await withTimeout(
      () => this.provider.getBalance(address),
      this.timeoutMs,
      `balance lookup for ${address}`
    );
    return Number(ethers.utils.formatEther(raw));
  }
}

/** Accepts any-case hex addresses and returns the checksummed form, or null. */
export function normalizeEvmAddress(raw: string): string | null {
  const candidate = raw.trim();
  if (!/^0x[a-fA-F0-9]{40}$/.test(candidate)) {
    return null;
  }
  const lowered = candidate.toLowerCase();
  return ethers.utils.isAddress(lowered) ? ethers.utils.getAddress(lowered) : null;
}
