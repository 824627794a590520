import inquirer from 'inquirer';

import type { ChatTransport, IncomingMessageHandler } from './types.js';

export interface ConsoleTransportOptions {
  requesterId: string;
  requesterName: string;
  channelId?: string;
}

const EXIT_WORDS = new Set(['exit', 'quit', '/exit', '/quit']);

/**
 * Interactive terminal chat. Every line counts as a direct message, so the
 * proactive path is never taken here.
 */
export class ConsoleTransport implements ChatTransport {
  readonly name = 'console';
  private handler: IncomingMessageHandler | null = null;
  private running = false;
  private sequence = 0;

  constructor(private readonly options: ConsoleTransportOptions) {}

  onMessage(handler: IncomingMessageHandler): void {
    this.handler = handler;
  }

  async start(): Promise<void> {
    this.running = true;
    const channelId = this.options.channelId ?? 'console';
    while (this.running) {
      const answers = await inquirer.prompt<{ text: string }>([
        { type: 'input', name: 'text', message: `${this.options.requesterName}>` },
      ]);
      const text = answers.text.trim();
      if (EXIT_WORDS.has(text.toLowerCase())) {
        this.running = false;
        break;
      }
      if (!text || !this.handler) continue;

      this.sequence += 1;
      await this.handler({
        id: `console-${this.sequence}`,
        text,
        requesterId: this.options.requesterId,
        requesterName: this.options.requesterName,
        channelId,
        channelName: 'console',
        isDirectAddress: true,
        isDirectMessage: true,
        receivedAtMs: Date.now(),
      });
    }
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async send(_channelId: string, text: string): Promise<void> {
    console.log(`\n${text}\n`);
  }
}
