/**
 * Agent Communication Service
 * Handles inter-agent messaging and coordination on top of the message bus
 */

import { Message } from '../models/message';
import type { MessageType } from '../types/messageTypes';
import type { MessageBus, MessageHandler } from '../utils/messageBus';
import logger from '../utils/logger';

/**
 * Returns the recipient a message should be redirected to, or nothing to
 * leave it to the next rule.
 */
export type RoutingRule = (message: Message) => string | null | undefined;

export class AgentCommunicationService {
  private readonly messageBus: MessageBus;
  private readonly routingRules: RoutingRule[] = [];

  constructor(messageBus: MessageBus) {
    this.messageBus = messageBus;
  }

  /**
   * Send a message to another agent
   */
  sendMessage(
    sender: string,
    recipient: string,
    type: MessageType,
    content: unknown,
  ): Message {
    const message = new Message({ sender, recipient, type, content });
    this.messageBus.send(message);
    logger.debug('Message sent', { sender, recipient, type });
    return message;
  }

  /**
   * Broadcast a message to every subscribed participant except the sender
   * and the excluded names. Returns the messages queued.
   */
  broadcast(
    sender: string,
    type: MessageType,
    content: unknown,
    exclude: Iterable<string> = [],
  ): Message[] {
    const skip = new Set(exclude);
    skip.add(sender);

    const sent = this.messageBus
      .getSubscriberNames()
      .filter((name) => !skip.has(name))
      .map((recipient) => this.sendMessage(sender, recipient, type, content));

    logger.debug('Message broadcast', { sender, type, recipients: sent.length });
    return sent;
  }

  addRoutingRule(rule: RoutingRule): void {
    this.routingRules.push(rule);
  }

  /**
   * Apply routing rules in order; the first rule that names a recipient
   * rewrites the message. Unmatched messages keep their recipient.
   */
  route(message: Message): Message {
    for (const rule of this.routingRules) {
      try {
        const target = rule(message);
        if (target) {
          message.recipient = target;
          break;
        }
      } catch (error) {
        logger.error('Error applying routing rule', {
          messageId: message.id,
          error,
        });
      }
    }

    this.messageBus.send(message);
    return message;
  }

  subscribe(name: string, handler: MessageHandler): void {
    this.messageBus.subscribe(name, handler);
  }

  unsubscribe(name: string, handler?: MessageHandler): void {
    this.messageBus.unsubscribe(name, handler);
  }

  /**
   * Request-response pattern: send a message and wait for a reply addressed
   * to `from` whose replyTo is the request id. Resolves null on timeout.
   */
  async requestResponse(
    from: string,
    to: string,
    type: MessageType,
    content: unknown,
    timeoutMs = 5000,
  ): Promise<Message | null> {
    const request = new Message({ sender: from, recipient: to, type, content });

    return new Promise<Message | null>((resolve) => {
      const responseHandler: MessageHandler = (message) => {
        if (message.replyTo === request.id) {
          clearTimeout(timeout);
          this.messageBus.unsubscribe(from, responseHandler);
          resolve(message);
        }
      };

      const timeout = setTimeout(() => {
        this.messageBus.unsubscribe(from, responseHandler);
        logger.debug('Request timed out', { from, to, requestId: request.id });
        resolve(null);
      }, timeoutMs);

      this.messageBus.subscribe(from, responseHandler);
      this.messageBus.send(request);
    });
  }
}
