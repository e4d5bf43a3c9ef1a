import {
  BANK_KEYS,
  DeleteOutcome,
  Email,
  FolderSummary,
  InboxStatus,
  NewEmail,
  SendEmailPayload,
} from '../../types';
import { IMailboxStore } from '../../domain/repositories/IMailboxStore';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';

/**
 * True for mail produced by one of the simulated banks.
 */
export function isBankEmail(email: Email): boolean {
  return email.tags.some(tag => BANK_KEYS.some(bank => bank === tag));
}

/**
 * Application service over the mailbox store.
 *
 * Every method performs its store calls before its first `await`, so a
 * multi-step sequence (look up, then mutate) runs as one uninterrupted
 * unit; domain events are emitted afterwards.
 */
export class MailboxService {
  constructor(
    private store: IMailboxStore,
    private eventBus: IEventBus,
    private logger: ILogger,
    private userAddress: string
  ) {}

  private async foldersChanged(): Promise<void> {
    await this.eventBus.emit('folders:updated', this.store.folders());
  }

  /**
   * Deliver one message into the mailbox.
   */
  async receive(input: NewEmail): Promise<Email> {
    const [email] = await this.receiveMany([input]);
    return email;
  }

  /**
   * Deliver a batch. All records are stored before any event fires.
   */
  async receiveMany(inputs: NewEmail[]): Promise<Email[]> {
    const stored: Email[] = [];
    for (const input of inputs) {
      const id = this.store.add(input);
      const email = this.store.get(id);
      if (email) stored.push(email);
    }

    for (const email of stored) {
      await this.eventBus.emit('email:received', email);
    }
    if (stored.length > 0) {
      await this.foldersChanged();
    }
    return stored;
  }

  /**
   * Open a message: an unread one flips to read first.
   * @returns The message as it is after opening, or undefined
   */
  async readEmail(id: string): Promise<Email | undefined> {
    const marked = this.store.markAsRead(id);
    const email = this.store.get(id);
    if (!email) return undefined;

    if (marked) {
      await this.eventBus.emit('email:read', { id, folder: email.folder });
      await this.foldersChanged();
    }
    return email;
  }

  async listEmails(folder: string, limit?: number, offset?: number): Promise<Email[]> {
    return this.store.list(folder, limit, offset);
  }

  async searchEmails(query: string, folder?: string): Promise<Email[]> {
    return this.store.search(query, folder);
  }

  async markAsRead(id: string): Promise<boolean> {
    const email = this.store.get(id);
    if (!email || !this.store.markAsRead(id)) return false;

    await this.eventBus.emit('email:read', { id, folder: email.folder });
    await this.foldersChanged();
    return true;
  }

  async moveEmail(id: string, targetFolder: string): Promise<boolean> {
    const before = this.store.get(id);
    if (!before || !this.store.move(id, targetFolder)) return false;

    await this.eventBus.emit('email:moved', { id, from: before.folder, to: targetFolder });
    await this.foldersChanged();
    return true;
  }

  /**
   * Trash a message, or remove it for good when it is already in trash.
   * @returns What happened, or undefined when the id is unknown
   */
  async deleteEmail(id: string): Promise<DeleteOutcome | undefined> {
    const before = this.store.get(id);
    if (!before || !this.store.delete(id)) return undefined;

    if (before.folder === 'trash') {
      await this.eventBus.emit('email:purged', { id });
      await this.foldersChanged();
      return 'purged';
    }

    await this.eventBus.emit('email:trashed', { id, from: before.folder });
    await this.foldersChanged();
    return 'trashed';
  }

  /**
   * File an outgoing message under `sent`. Sent mail starts out read.
   */
  async sendEmail(payload: SendEmailPayload): Promise<Email> {
    const email = await this.receive({
      subject: payload.subject,
      sender: this.userAddress,
      recipients: payload.to,
      cc: payload.cc ?? [],
      body: payload.body,
      priority: payload.priority ?? 'normal',
      folder: 'sent',
      status: 'read',
    });
    this.logger.info(`Sent email ${email.id}`, { to: payload.to, subject: payload.subject });
    return email;
  }

  getFolderSummary(): FolderSummary[] {
    return this.store.folders();
  }

  getStatus(): InboxStatus {
    const emails = this.store.all();
    const bankEmails = emails.filter(isBankEmail).length;
    return {
      totalEmails: emails.length,
      bankEmails,
      regularEmails: emails.length - bankEmails,
      unreadEmails: emails.filter(e => e.status === 'unread').length,
    };
  }

  isEmpty(): boolean {
    return this.store.size() === 0;
  }
}
