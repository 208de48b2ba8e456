/**
 * Message channel
 *
 * The session protocol only needs to send a text frame, wait for the next
 * one and close. `MessageChannel` is that seam; `WebSocketChannel` backs it
 * with a real socket; tests pair two in-memory ends.
 */

import { ConnectionClosedError } from '../errors.js';

export interface MessageChannel {
  send(text: string): Promise<void>;
  /**
   * Resolve with the next inbound text frame.
   *
   * @throws ConnectionClosedError once the channel has closed and no frames remain
   */
  receive(): Promise<string>;
  close(code: number, reason?: string): Promise<void>;
  readonly closed: boolean;
}

interface Waiter {
  resolve: (text: string) => void;
  reject: (error: Error) => void;
}

/**
 * Inbound frame buffer shared by channel implementations: frames that
 * arrive before anyone waits are queued, waiters that arrive first are
 * parked, and a close rejects every parked waiter.
 */
export class InboundQueue {
  private readonly frames: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closedWith: ConnectionClosedError | null = null;

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  push(text: string): void {
    if (this.closedWith) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(text);
    } else {
      this.frames.push(text);
    }
  }

  next(): Promise<string> {
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    return new Promise<string>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(code: number, reason: string): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = new ConnectionClosedError(code, reason);
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(this.closedWith);
    }
  }
}
