/**
 * In-process MessageChannel pair for session tests. Whatever one end sends
 * the other end receives; closing either end closes both.
 */

import { InboundQueue, type MessageChannel } from '../../src/transport/channel.js';
import { ConnectionClosedError } from '../../src/errors.js';
import { CloseCode } from '../../src/transport/closeCodes.js';

class MemoryChannel implements MessageChannel {
  readonly inbound = new InboundQueue();
  readonly sent: string[] = [];
  peer: MemoryChannel | null = null;
  closeCode: number | null = null;

  get closed(): boolean {
    return this.inbound.isClosed;
  }

  async send(text: string): Promise<void> {
    if (this.closed || !this.peer) {
      throw new ConnectionClosedError(CloseCode.AbnormalClosure, 'channel closed');
    }
    this.sent.push(text);
    this.peer.inbound.push(text);
  }

  receive(): Promise<string> {
    return this.inbound.next();
  }

  async close(code: number, reason = ''): Promise<void> {
    this.closeCode = code;
    this.inbound.close(code, reason);
    this.peer?.inbound.close(code, reason);
  }
}

export function createChannelPair(): { client: MemoryChannel; server: MemoryChannel } {
  const client = new MemoryChannel();
  const server = new MemoryChannel();
  client.peer = server;
  server.peer = client;
  return { client, server };
}

export type { MemoryChannel };
