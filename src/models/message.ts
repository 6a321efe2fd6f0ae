/**
 * Addressed, timestamped envelope exchanged between agents and the system
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type {
  MessageInit,
  MessageRecord,
  MessageType,
} from '../types/messageTypes';
import { ValidationError } from '../utils/errors';

const messageRecordSchema = z.object({
  id: z.string().min(1),
  sender: z.string(),
  recipient: z.string(),
  type: z.enum([
    'task_request',
    'task_response',
    'status_update',
    'coordination',
    'error',
    'info',
  ]),
  content: z.unknown(),
  timestamp: z.string().datetime({ offset: true }),
  replyTo: z.string().nullable().default(null),
  metadata: z.record(z.unknown()).default({}),
});

export class Message {
  readonly id: string;
  readonly sender: string;
  recipient: string;
  readonly type: MessageType;
  readonly content: unknown;
  readonly timestamp: Date;
  readonly replyTo?: string;
  readonly metadata: Record<string, unknown>;

  constructor(init: MessageInit) {
    this.id = init.id ?? randomUUID();
    this.sender = init.sender;
    this.recipient = init.recipient;
    this.type = init.type;
    this.content = init.content;
    this.timestamp = init.timestamp ?? new Date();
    this.replyTo = init.replyTo;
    this.metadata = { ...(init.metadata ?? {}) };
  }

  /**
   * Response addressed back to this message's sender.
   */
  reply(sender: string, type: MessageType, content: unknown): Message {
    return new Message({
      sender,
      recipient: this.sender,
      type,
      content,
      replyTo: this.id,
    });
  }

  toRecord(): MessageRecord {
    return {
      id: this.id,
      sender: this.sender,
      recipient: this.recipient,
      type: this.type,
      content: this.content,
      timestamp: this.timestamp.toISOString(),
      replyTo: this.replyTo ?? null,
      metadata: { ...this.metadata },
    };
  }

  static fromRecord(input: unknown): Message {
    const parsed = messageRecordSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid message record',
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }

    const record = parsed.data;
    return new Message({
      id: record.id,
      sender: record.sender,
      recipient: record.recipient,
      type: record.type,
      content: record.content,
      timestamp: new Date(record.timestamp),
      replyTo: record.replyTo ?? undefined,
      metadata: record.metadata,
    });
  }
}
