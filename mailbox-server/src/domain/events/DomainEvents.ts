import { Email, FolderSummary } from '../../types';

/**
 * Type-safe domain event definitions.
 * These match the events emitted by MailboxService after a store mutation.
 */

export interface EmailReceivedEvent {
  type: 'email:received';
  data: Email;
}

export interface EmailReadEvent {
  type: 'email:read';
  data: { id: string; folder: string };
}

export interface EmailMovedEvent {
  type: 'email:moved';
  data: { id: string; from: string; to: string };
}

export interface EmailTrashedEvent {
  type: 'email:trashed';
  data: { id: string; from: string };
}

export interface EmailPurgedEvent {
  type: 'email:purged';
  data: { id: string };
}

export interface FoldersUpdatedEvent {
  type: 'folders:updated';
  data: FolderSummary[];
}

export type DomainEvent =
  | EmailReceivedEvent
  | EmailReadEvent
  | EmailMovedEvent
  | EmailTrashedEvent
  | EmailPurgedEvent
  | FoldersUpdatedEvent;

/**
 * Type-safe event map for event bus.
 * Maps event name strings to their payload types.
 */
export type TypedEventMap = {
  [E in DomainEvent as E['type']]: E['data'];
};

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

/**
 * Get the payload type for a specific event name.
 */
export type EventPayload<K extends EventName> = TypedEventMap[K];
