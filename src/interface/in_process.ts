import type { ChatTransport, IncomingChatMessage, IncomingMessageHandler } from './types.js';

export interface SentMessage {
  channelId: string;
  text: string;
}

/** Transport that lives entirely in memory. Used by tests and the one-shot CLI. */
export class InProcessTransport implements ChatTransport {
  readonly name = 'in-process';
  readonly sent: SentMessage[] = [];
  readonly typing: string[] = [];
  private handler: IncomingMessageHandler | null = null;
  private running = false;

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  get isRunning(): boolean {
    return this.running;
  }

  onMessage(handler: IncomingMessageHandler): void {
    this.handler = handler;
  }

  async send(channelId: string, text: string): Promise<void> {
    this.sent.push({ channelId, text });
  }

  async withTyping<T>(channelId: string, fn: () => Promise<T>): Promise<T> {
    this.typing.push(channelId);
    return fn();
  }

  /** Feeds a message through the registered handler and waits for it. */
  async deliver(message: IncomingChatMessage): Promise<void> {
    if (!this.running) {
      throw new Error('Transport is not running');
    }
    if (!this.handler) {
      throw new Error('No message handler registered');
    }
    await this.handler(message);
  }
}
