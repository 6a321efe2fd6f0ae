/**
 * Message Bus for Inter-Agent Communication
 *
 * Producers enqueue; a single consumer loop delivers each message to the
 * handlers subscribed under its recipient name and keeps a capped history.
 * Emits `delivered` and `failed` events for observers.
 */

import { EventEmitter } from 'events';
import { DEFAULT_SYSTEM_CONFIG } from '../config/systemConfig';
import type { Message } from '../models/message';
import type { MessageBusStats } from '../types/messageTypes';
import { AsyncQueue } from './asyncQueue';
import logger from './logger';

export type MessageHandler = (message: Message) => void | Promise<void>;

export interface MessageBusOptions {
  maxHistory?: number;
  pollWaitMs?: number;
}

export interface DeliveryFailure {
  message: Message;
  reason: 'no_subscribers' | 'handler_error';
  error?: unknown;
}

export class MessageBus extends EventEmitter {
  readonly maxHistory: number;
  private readonly pollWaitMs: number;
  private readonly subscribers = new Map<string, MessageHandler[]>();
  private readonly queue = new AsyncQueue<Message>();
  private readonly history: Message[] = [];
  private stats = {
    messagesSent: 0,
    messagesDelivered: 0,
    messagesFailed: 0,
  };
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: MessageBusOptions = {}) {
    super();
    this.maxHistory = options.maxHistory ?? DEFAULT_SYSTEM_CONFIG.maxHistory;
    this.pollWaitMs = options.pollWaitMs ?? DEFAULT_SYSTEM_CONFIG.busPollWaitMs;
  }

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  start(): void {
    if (this.abortController) return;

    const controller = new AbortController();
    this.abortController = controller;
    this.loop = this.processMessages(controller.signal);
    logger.info('Message bus started', { maxHistory: this.maxHistory });
  }

  /**
   * Stop consuming. Messages still queued stay queued until the next start.
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    if (!controller) return;

    controller.abort();
    await this.loop;
    this.abortController = null;
    this.loop = null;
    logger.info('Message bus stopped', { queued: this.queue.size });
  }

  /**
   * Subscribe a handler to messages addressed to `name`
   */
  subscribe(name: string, handler: MessageHandler): void {
    const handlers = this.subscribers.get(name) ?? [];
    handlers.push(handler);
    this.subscribers.set(name, handlers);
    logger.debug('Subscribed to messages', { name, handlers: handlers.length });
  }

  /**
   * Remove one handler, or every handler when none is given
   */
  unsubscribe(name: string, handler?: MessageHandler): void {
    const handlers = this.subscribers.get(name);
    if (!handlers) return;

    if (!handler) {
      this.subscribers.delete(name);
      return;
    }

    const index = handlers.indexOf(handler);
    if (index !== -1) {
      handlers.splice(index, 1);
    }
    if (handlers.length === 0) {
      this.subscribers.delete(name);
    }
  }

  getSubscriberNames(): string[] {
    return Array.from(this.subscribers.keys());
  }

  send(message: Message): void {
    this.stats.messagesSent++;
    this.queue.put(message);
  }

  /**
   * Messages addressed to `recipient`, optionally at or after `since`
   */
  getMessagesFor(recipient: string, since?: Date): Message[] {
    return this.history.filter(
      (message) =>
        message.recipient === recipient &&
        (since === undefined || message.timestamp.getTime() >= since.getTime()),
    );
  }

  getHistory(): Message[] {
    return [...this.history];
  }

  getStats(): MessageBusStats {
    const subscribers: Record<string, number> = {};
    for (const [name, handlers] of this.subscribers) {
      subscribers[name] = handlers.length;
    }

    return {
      ...this.stats,
      queueSize: this.queue.size,
      historySize: this.history.length,
      subscribers,
    };
  }

  private async processMessages(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const message = await this.queue.get(this.pollWaitMs, signal);
        if (message) {
          await this.deliver(message);
        }
      } catch (error) {
        logger.error('Error processing message', { error });
        this.stats.messagesFailed++;
      }
    }
  }

  private async deliver(message: Message): Promise<void> {
    this.record(message);

    // Copy: handlers may (un)subscribe while being called
    const handlers = [...(this.subscribers.get(message.recipient) ?? [])];
    if (handlers.length === 0) {
      logger.warn('No subscribers found for recipient', {
        recipient: message.recipient,
        messageId: message.id,
        type: message.type,
      });
      this.stats.messagesFailed++;
      this.emitFailure({ message, reason: 'no_subscribers' });
      return;
    }

    for (const handler of handlers) {
      let delivered = false;
      try {
        await handler(message);
        delivered = true;
      } catch (error) {
        logger.error('Error delivering message', {
          recipient: message.recipient,
          messageId: message.id,
          error,
        });
        this.stats.messagesFailed++;
        this.emitFailure({ message, reason: 'handler_error', error });
      }
      if (delivered) {
        this.stats.messagesDelivered++;
        this.emit('delivered', message);
      }
    }
  }

  private record(message: Message): void {
    this.history.push(message);
    while (this.history.length > this.maxHistory) {
      this.history.shift();
    }
  }

  private emitFailure(failure: DeliveryFailure): void {
    // not 'error': EventEmitter throws when nobody listens for that
    this.emit('failed', failure);
  }
}
