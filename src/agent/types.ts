export interface Requester {
  id: string;
  name: string;
}

/** A chat message as it reaches the router, independent of the transport. */
export interface InboundMessage {
  id: string;
  text: string;
  requesterId: string;
  requesterName: string;
  channelId: string;
  channelName: string;
  /** The bot was mentioned or replied to. */
  isDirectAddress: boolean;
  isDirectMessage: boolean;
  receivedAtMs: number;
}

export function requesterOf(message: InboundMessage): Requester {
  return { id: message.requesterId, name: message.requesterName };
}
