/**
 * Type definitions for inter-component messaging
 */

export type MessageType =
  | 'task_request'
  | 'task_response'
  | 'status_update'
  | 'coordination'
  | 'error'
  | 'info';

export interface MessageInit {
  id?: string;
  sender: string;
  recipient: string;
  type: MessageType;
  content: unknown;
  timestamp?: Date;
  replyTo?: string;
  metadata?: Record<string, unknown>;
}

export interface MessageRecord {
  id: string;
  sender: string;
  recipient: string;
  type: MessageType;
  content: unknown;
  timestamp: string;
  replyTo: string | null;
  metadata: Record<string, unknown>;
}

export interface MessageBusStats {
  messagesSent: number;
  messagesDelivered: number;
  messagesFailed: number;
  queueSize: number;
  historySize: number;
  subscribers: Record<string, number>;
}
