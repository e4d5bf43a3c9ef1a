import { DEFAULT_FOLDERS, Email, FolderName, FolderSummary } from '../../types';

/**
 * Count the visible and unread records filed under a folder.
 * Deleted records never count, wherever they sit.
 */
export function tallyFolder(records: Iterable<Email>, folder: string): { emailCount: number; unreadCount: number } {
  let emailCount = 0;
  let unreadCount = 0;
  for (const email of records) {
    if (email.folder !== folder || email.status === 'deleted') continue;
    emailCount++;
    if (email.status === 'unread') unreadCount++;
  }
  return { emailCount, unreadCount };
}

/**
 * Passive cache of per-folder counts.
 *
 * The registry never scans on its own: the owning store calls
 * `recompute` after every mutation that can change folder membership
 * or read status, and that call is the only way counts change.
 */
export class FolderRegistry {
  private folders = new Map<string, FolderSummary>();

  constructor(names: readonly FolderName[] = DEFAULT_FOLDERS) {
    if (names.length === 0) {
      throw new Error('Folder registry needs at least one folder');
    }
    for (const name of names) {
      if (this.folders.has(name)) {
        throw new Error(`Duplicate folder in registry: ${name}`);
      }
      this.folders.set(name, { name, emailCount: 0, unreadCount: 0 });
    }
  }

  has(name: string): boolean {
    return this.folders.has(name);
  }

  get(name: string): FolderSummary | undefined {
    const folder = this.folders.get(name);
    return folder ? { ...folder } : undefined;
  }

  names(): FolderName[] {
    return Array.from(this.folders.values(), f => f.name);
  }

  summaries(): FolderSummary[] {
    return Array.from(this.folders.values(), f => ({ ...f }));
  }

  /**
   * Rescan `records` and refresh the cached counts of one folder.
   * Unknown folder names are ignored.
   */
  recompute(name: string, records: Iterable<Email>): void {
    const folder = this.folders.get(name);
    if (!folder) return;

    const { emailCount, unreadCount } = tallyFolder(records, name);
    folder.emailCount = emailCount;
    folder.unreadCount = unreadCount;
  }
}
