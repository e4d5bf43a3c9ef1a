import { DEFAULT_FOLDERS, Email, FolderName, FolderSummary, NewEmail } from '../../types';
import { IMailboxStore } from '../../domain/repositories/IMailboxStore';
import { FolderRegistry, tallyFolder } from '../../domain/mailbox/FolderRegistry';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { InvariantError, ValidationError } from '../../domain/common/Errors';

export interface MailboxStoreOptions {
  folders?: readonly FolderName[];
  now?: () => number;
}

const TRASH = 'trash';

function cloneEmail(email: Email): Email {
  return {
    ...email,
    recipients: [...email.recipients],
    cc: [...email.cc],
    bcc: [...email.bcc],
    attachments: email.attachments.map(a => ({ ...a })),
    tags: [...email.tags],
  };
}

function newestFirst(a: Email, b: Email): number {
  // Array#sort is stable, so equal timestamps keep insertion order
  return b.timestamp - a.timestamp;
}

/**
 * Process-memory implementation of IMailboxStore.
 * Records live in a Map keyed by id; Map iteration order is insertion
 * order, and an overwritten key keeps its original position.
 */
export class InMemoryMailboxStore implements IMailboxStore {
  private emails = new Map<string, Email>();
  private registry: FolderRegistry;
  private now: () => number;

  constructor(
    private idGenerator: IIdGenerator,
    private logger: ILogger,
    options: MailboxStoreOptions = {}
  ) {
    this.registry = new FolderRegistry(options.folders ?? DEFAULT_FOLDERS);
    if (!this.registry.has('inbox') || !this.registry.has(TRASH)) {
      throw new Error('Mailbox folders must include inbox and trash');
    }
    this.now = options.now ?? Date.now;
  }

  private recompute(folder: string): void {
    this.registry.recompute(folder, this.emails.values());
  }

  add(input: NewEmail): string {
    const folder = input.folder ?? 'inbox';
    if (!this.registry.has(folder)) {
      throw new ValidationError(`Unknown folder: '${folder}'`, { folder, folders: this.registry.names() });
    }

    const id = input.id ? input.id : this.idGenerator.generate('email');
    const email: Email = {
      id,
      subject: input.subject,
      sender: input.sender,
      recipients: [...input.recipients],
      cc: [...(input.cc ?? [])],
      bcc: [...(input.bcc ?? [])],
      body: input.body,
      htmlBody: input.htmlBody ?? null,
      timestamp: input.timestamp ?? this.now(),
      status: input.status ?? 'unread',
      priority: input.priority ?? 'normal',
      attachments: (input.attachments ?? []).map(a => ({
        filename: a.filename,
        size: a.size,
        contentType: a.contentType,
        attachmentId: a.attachmentId ? a.attachmentId : this.idGenerator.generate('att'),
      })),
      folder,
      threadId: input.threadId ?? null,
      inReplyTo: input.inReplyTo ?? null,
      tags: [...(input.tags ?? [])],
    };

    const previous = this.emails.get(id);
    this.emails.set(id, email);

    if (previous) {
      this.logger.warn(`Email ${id} overwritten`, { from: previous.folder, to: folder });
      this.recompute(previous.folder);
    }
    this.recompute(folder);

    this.logger.debug(`Added email: ${id} to ${folder}`);
    return id;
  }

  get(id: string): Email | undefined {
    const email = this.emails.get(id);
    return email ? cloneEmail(email) : undefined;
  }

  list(folder: string, limit: number = 50, offset: number = 0): Email[] {
    if (limit <= 0) return [];
    const start = Math.max(0, offset);

    return Array.from(this.emails.values())
      .filter(e => e.folder === folder && e.status !== 'deleted')
      .sort(newestFirst)
      .slice(start, start + limit)
      .map(cloneEmail);
  }

  search(query: string, folder?: string): Email[] {
    const needle = query.toLowerCase();

    return Array.from(this.emails.values())
      .filter(e => {
        if (e.status === 'deleted') return false;
        if (folder && e.folder !== folder) return false;
        return e.subject.toLowerCase().includes(needle)
          || e.sender.toLowerCase().includes(needle)
          || e.body.toLowerCase().includes(needle);
      })
      .sort(newestFirst)
      .map(cloneEmail);
  }

  markAsRead(id: string): boolean {
    const email = this.emails.get(id);
    if (!email || email.status !== 'unread') return false;

    email.status = 'read';
    this.recompute(email.folder);
    this.logger.debug(`Marked email read: ${id}`);
    return true;
  }

  move(id: string, targetFolder: string): boolean {
    const email = this.emails.get(id);
    if (!email || !this.registry.has(targetFolder)) return false;

    const from = email.folder;
    email.folder = targetFolder;
    this.recompute(from);
    this.recompute(targetFolder);
    this.logger.debug(`Moved email ${id}: ${from} -> ${targetFolder}`);
    return true;
  }

  delete(id: string): boolean {
    const email = this.emails.get(id);
    if (!email) return false;

    if (email.folder === TRASH) {
      this.emails.delete(id);
      this.recompute(TRASH);
      this.logger.debug(`Purged email: ${id}`);
      return true;
    }

    const from = email.folder;
    email.folder = TRASH;
    email.status = 'deleted';
    this.recompute(from);
    this.recompute(TRASH);
    this.logger.debug(`Trashed email ${id} from ${from}`);
    return true;
  }

  folders(): FolderSummary[] {
    return this.registry.summaries();
  }

  size(): number {
    return this.emails.size;
  }

  all(): Email[] {
    return Array.from(this.emails.values(), cloneEmail);
  }

  verifyCounts(): void {
    for (const cached of this.registry.summaries()) {
      const actual = tallyFolder(this.emails.values(), cached.name);
      if (actual.emailCount !== cached.emailCount || actual.unreadCount !== cached.unreadCount) {
        throw new InvariantError(`Folder counts drifted for '${cached.name}'`, { cached, actual });
      }
    }
  }
}
