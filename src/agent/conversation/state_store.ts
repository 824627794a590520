import type { ChatMessage, ChatRole } from '../../core/llm.js';
import { KeyedLock } from './keyed_lock.js';

export interface ConversationStateOptions {
  /** Number of user/assistant pairs kept besides the system message. */
  windowSize: number;
  /** System message for a freshly created or reset conversation. */
  initialSystemMessage: string;
}

interface ConversationState {
  history: ChatMessage[];
}

/**
 * Per-requester rolling chat history. history[0] is always the system message and
 * the length never exceeds 1 + 2 * windowSize.
 */
export class ConversationStateStore {
  private readonly states = new Map<string, ConversationState>();
  private readonly lock = new KeyedLock();
  private readonly maxTail: number;

  constructor(private readonly options: ConversationStateOptions) {
    this.maxTail = 2 * Math.max(0, Math.floor(options.windowSize));
  }

  get maxLength(): number {
    return 1 + this.maxTail;
  }

  has(requesterId: string): boolean {
    return this.states.has(requesterId);
  }

  getOrCreate(requesterId: string): ChatMessage[] {
    return this.state(requesterId).history.slice();
  }

  /** Copy of the history, oldest first; empty for unknown requesters. */
  history(requesterId: string): ChatMessage[] {
    return this.states.get(requesterId)?.history.slice() ?? [];
  }

  append(requesterId: string, role: Exclude<ChatRole, 'system'>, content: string): void {
    const state = this.state(requesterId);
    state.history.push({ role, content });
    this.evict(state);
  }

  refreshSystemMessage(requesterId: string, content: string): void {
    const state = this.state(requesterId);
    state.history[0] = { role: 'system', content };
  }

  /** Clears back to the system message. True only when there was history beyond it. */
  reset(requesterId: string): boolean {
    const state = this.states.get(requesterId);
    if (!state) {
      return false;
    }
    const hadHistory = state.history.length > 1;
    const system = state.history[0] ?? { role: 'system', content: this.options.initialSystemMessage };
    state.history = [system];
    return hadHistory;
  }

  runExclusive<T>(requesterId: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(requesterId, fn);
  }

  private state(requesterId: string): ConversationState {
    let state = this.states.get(requesterId);
    if (!state) {
      state = { history: [{ role: 'system', content: this.options.initialSystemMessage }] };
      this.states.set(requesterId, state);
    }
    return state;
  }

  private evict(state: ConversationState): void {
    const overflow = state.history.length - this.maxLength;
    if (overflow > 0) {
      state.history.splice(1, overflow);
    }
  }
}
