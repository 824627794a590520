/**
 * Recent channel chatter and the last time the bot answered each requester in
 * each channel. Feeds the respond decision for ambient messages.
 */
export class ChannelContext {
  private readonly lines = new Map<string, string[]>();
  private readonly lastExchange = new Map<string, number>();

  constructor(private readonly maxLines: number) {}

  record(channelId: string, author: string, text: string): void {
    const buffer = this.lines.get(channelId) ?? [];
    buffer.push(`${author}: ${text}`);
    if (buffer.length > this.maxLines) {
      buffer.splice(0, buffer.length - this.maxLines);
    }
    this.lines.set(channelId, buffer);
  }

  recent(channelId: string): string[] {
    return this.lines.get(channelId)?.slice() ?? [];
  }

  markExchange(channelId: string, requesterId: string, atMs: number): void {
    this.lastExchange.set(`${channelId}:${requesterId}`, atMs);
  }

  lastExchangeAt(channelId: string, requesterId: string): number | null {
    return this.lastExchange.get(`${channelId}:${requesterId}`) ?? null;
  }
}
