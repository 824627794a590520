import { afterEach, describe, expect, it, vi } from 'vitest';

import { parseGateReply, ResponseDecisionGate } from '../../src/agent/gate/respond_gate.js';
import type { InboundMessage } from '../../src/agent/types.js';
import type { LlmClient } from '../../src/core/llm.js';
import { Logger } from '../../src/core/logger.js';

const logger = new Logger('error');
const options = { ambientReplies: true, conversationTimeoutSeconds: 300, timeoutMs: 50 };
const NOW = 1_700_000_000_000;

function message(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    id: 'm1',
    text,
    requesterId: 'u1',
    requesterName: 'alice',
    channelId: 'c1',
    channelName: 'trading',
    isDirectAddress: false,
    isDirectMessage: false,
    receivedAtMs: NOW,
    ...overrides,
  };
}

const quiet = { recentMessages: [], lastExchangeAtMs: null };

function replying(content: string): LlmClient {
  return { model: 'stub', complete: vi.fn(async () => ({ content, model: 'stub' })) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseGateReply', () => {
  it('reads the decision from surrounding text', () => {
    expect(parseGateReply('Sure: {"should_respond": true}')).toBe(true);
    expect(parseGateReply('{"should_respond": false}')).toBe(false);
  });

  it('returns null for anything else', () => {
    expect(parseGateReply('yes')).toBeNull();
    expect(parseGateReply('{"should_respond": "yes"}')).toBeNull();
    expect(parseGateReply('{not json}')).toBeNull();
  });
});

describe('ResponseDecisionGate', () => {
  it('never answers empty text', async () => {
    const gate = new ResponseDecisionGate(null, options, logger);
    await expect(gate.shouldRespond(message('  ', { isDirectMessage: true }), quiet)).resolves.toEqual({
      respond: false,
      proactive: false,
      reason: 'empty',
    });
  });

  it('always answers direct messages and mentions without asking the llm', async () => {
    const llm = replying('{"should_respond": false}');
    const gate = new ResponseDecisionGate(llm, options, logger);

    await expect(gate.shouldRespond(message('hi', { isDirectAddress: true }), quiet)).resolves.toEqual({
      respond: true,
      proactive: false,
      reason: 'direct',
    });
    await expect(gate.shouldRespond(message('hi', { isDirectMessage: true }), quiet)).resolves.toMatchObject({
      respond: true,
      proactive: false,
    });
    expect(llm.complete).not.toHaveBeenCalled();
  });

  it('stays silent on ambient messages when ambient replies are off', async () => {
    const gate = new ResponseDecisionGate(null, { ...options, ambientReplies: false }, logger);
    await expect(gate.shouldRespond(message("What's BTC doing?"), quiet)).resolves.toEqual({
      respond: false,
      proactive: true,
      reason: 'ambient_disabled',
    });
  });

  describe('keyword mode', () => {
    const gate = new ResponseDecisionGate(null, options, logger);

    it('answers topical questions', async () => {
      await expect(gate.shouldRespond(message("What's BTC doing?"), quiet)).resolves.toEqual({
        respond: true,
        proactive: true,
        reason: 'heuristic_relevant',
      });
    });

    it('ignores off-topic chatter', async () => {
      await expect(gate.shouldRespond(message('nice weather today'), quiet)).resolves.toMatchObject({
        respond: false,
        reason: 'heuristic_irrelevant',
      });
    });

    it('follows up on a recent exchange even without a question', async () => {
      const recent = { recentMessages: [], lastExchangeAtMs: NOW - 60_000 };
      const stale = { recentMessages: [], lastExchangeAtMs: NOW - 301_000 };

      await expect(gate.shouldRespond(message('ETH looks strong'), recent)).resolves.toMatchObject({
        respond: true,
      });
      await expect(gate.shouldRespond(message('ETH looks strong'), stale)).resolves.toMatchObject({
        respond: false,
      });
    });
  });

  describe('llm mode', () => {
    it('follows the llm verdict', async () => {
      const yes = new ResponseDecisionGate(replying('{"should_respond": true}'), options, logger);
      const no = new ResponseDecisionGate(replying('{"should_respond": false}'), options, logger);

      await expect(yes.shouldRespond(message('thoughts on SOL'), quiet)).resolves.toEqual({
        respond: true,
        proactive: true,
        reason: 'llm_yes',
      });
      await expect(no.shouldRespond(message('thoughts on SOL'), quiet)).resolves.toMatchObject({
        respond: false,
        reason: 'llm_no',
      });
    });

    it('stays silent on an unreadable verdict', async () => {
      const gate = new ResponseDecisionGate(replying('maybe'), options, logger);
      await expect(gate.shouldRespond(message('thoughts on SOL'), quiet)).resolves.toMatchObject({
        respond: false,
        reason: 'llm_unparseable',
      });
    });

    it('stays silent when the llm fails', async () => {
      const llm: LlmClient = {
        model: 'stub',
        complete: vi.fn(async () => {
          throw new Error('provider down');
        }),
      };
      const gate = new ResponseDecisionGate(llm, options, logger);
      await expect(gate.shouldRespond(message('thoughts on SOL'), quiet)).resolves.toMatchObject({
        respond: false,
        proactive: true,
        reason: 'llm_failed',
      });
    });
  });
});
