import { Attachment } from '../types';

export interface OutgoingMessage {
  text: string;
  attachments: Attachment[];
}

/**
 * Holds at most one message waiting for the current turn to finish. Offering a second message
 * replaces the first; the replaced message is returned so the caller can report the drop.
 */
export class Outbox {
  private pending?: OutgoingMessage;

  get hasPending(): boolean {
    return this.pending !== undefined;
  }

  peek(): OutgoingMessage | undefined {
    return this.pending;
  }

  offer(message: OutgoingMessage): OutgoingMessage | undefined {
    const replaced = this.pending;
    this.pending = message;
    return replaced;
  }

  take(): OutgoingMessage | undefined {
    const message = this.pending;
    this.pending = undefined;
    return message;
  }

  clear(): void {
    this.pending = undefined;
  }
}
