import type { InboundMessage } from '../agent/types.js';

export type IncomingChatMessage = InboundMessage;

export type IncomingMessageHandler = (message: IncomingChatMessage) => Promise<void>;

/** What the gateway needs from a chat platform connection. */
export interface ChatTransport {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  onMessage(handler: IncomingMessageHandler): void;
  send(channelId: string, text: string): Promise<void>;
  /** Shows a typing indicator for the duration of `fn`, where the platform has one. */
  withTyping?<T>(channelId: string, fn: () => Promise<T>): Promise<T>;
}
