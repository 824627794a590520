export interface CooldownDecision {
  allowed: boolean;
  reason: 'allowed' | 'cooldown';
  waitMs?: number;
}

/** Per-channel spacing for unsolicited replies. Direct replies never consult it. */
export class ProactiveCooldownGate {
  private readonly cooldownMs: number;
  private lastSentByChannel = new Map<string, number>();

  constructor(options?: { cooldownMs?: number }) {
    this.cooldownMs = Math.max(0, Number(options?.cooldownMs ?? 600_000));
  }

  evaluate(channelId: string, nowMs: number = Date.now()): CooldownDecision {
    const last = this.lastSentByChannel.get(channelId);
    if (last != null) {
      const elapsed = nowMs - last;
      if (elapsed < this.cooldownMs) {
        return { allowed: false, reason: 'cooldown', waitMs: this.cooldownMs - elapsed };
      }
    }
    return { allowed: true, reason: 'allowed' };
  }

  canSendProactive(channelId: string, nowMs?: number): boolean {
    return this.evaluate(channelId, nowMs).allowed;
  }

  recordProactiveSend(channelId: string, nowMs?: number): void {
    this.lastSentByChannel.set(channelId, nowMs ?? Date.now());
  }

  /** Check and record in one step. */
  tryAcquire(channelId: string, nowMs: number = Date.now()): CooldownDecision {
    const decision = this.evaluate(channelId, nowMs);
    if (decision.allowed) {
      this.recordProactiveSend(channelId, nowMs);
    }
    return decision;
  }
}
