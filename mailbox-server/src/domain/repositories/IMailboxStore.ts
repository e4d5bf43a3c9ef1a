import { Email, FolderSummary, NewEmail } from '../../types';

/**
 * The mailbox: every email record plus the folder registry.
 *
 * Operations are synchronous. Each one runs its read-modify-write
 * sequence (field update plus count recomputation) to completion before
 * returning, so calls issued from concurrent tool invocations are
 * serialized by the event loop and never observe half-applied state.
 *
 * Missing ids or folders are reported through `false`/`undefined`.
 * Only `add` throws, for a folder that is not registered.
 */
export interface IMailboxStore {
  /**
   * Insert a record, generating an id when absent. Last write wins on
   * an id collision.
   * @returns The stored record's id
   */
  add(email: NewEmail): string;

  get(id: string): Email | undefined;

  /**
   * Visible records of a folder, newest first, windowed by offset/limit.
   */
  list(folder: string, limit?: number, offset?: number): Email[];

  /**
   * Case-insensitive substring match on subject, sender or body.
   */
  search(query: string, folder?: string): Email[];

  /**
   * One-way unread -> read transition.
   */
  markAsRead(id: string): boolean;

  move(id: string, targetFolder: string): boolean;

  /**
   * First call moves to trash and marks deleted; a call on a record
   * already in trash removes it for good.
   * @returns false only when the id is unknown
   */
  delete(id: string): boolean;

  folders(): FolderSummary[];

  /**
   * Number of stored records, including trashed ones awaiting removal.
   */
  size(): number;

  /**
   * Every stored record in insertion order.
   */
  all(): Email[];

  /**
   * Compare cached folder counts against a full scan.
   * @throws {InvariantError} on the first mismatch
   */
  verifyCounts(): void;
}
