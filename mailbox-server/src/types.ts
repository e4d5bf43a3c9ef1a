// --- Enumerations ---

export const EMAIL_STATUSES = ['unread', 'read', 'replied', 'forwarded', 'archived', 'deleted'] as const;
export type EmailStatus = typeof EMAIL_STATUSES[number];

export const EMAIL_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;
export type EmailPriority = typeof EMAIL_PRIORITIES[number];

/**
 * Folders registered when a mailbox is created, in display order.
 */
export const DEFAULT_FOLDERS = ['inbox', 'sent', 'drafts', 'trash', 'spam', 'archive'] as const;
export type FolderName = typeof DEFAULT_FOLDERS[number];

// --- Records ---

export interface EmailAttachment {
  attachmentId: string;
  filename: string;
  size: number;  // bytes
  contentType: string;
}

export interface Email {
  id: string;
  subject: string;
  sender: string;
  recipients: string[];
  cc: string[];
  bcc: string[];
  body: string;
  htmlBody: string | null;
  timestamp: number;  // epoch millis
  status: EmailStatus;
  priority: EmailPriority;
  attachments: EmailAttachment[];
  folder: string;
  threadId: string | null;
  inReplyTo: string | null;
  tags: string[];
}

/**
 * Input to Mailbox add. Identity, timestamp and the mutable fields
 * fall back to defaults when omitted.
 */
export interface NewEmail {
  id?: string;
  subject: string;
  sender: string;
  recipients: string[];
  cc?: string[];
  bcc?: string[];
  body: string;
  htmlBody?: string | null;
  timestamp?: number;
  status?: EmailStatus;
  priority?: EmailPriority;
  attachments?: Array<Omit<EmailAttachment, 'attachmentId'> & { attachmentId?: string }>;
  folder?: string;
  threadId?: string | null;
  inReplyTo?: string | null;
  tags?: string[];
}

export interface FolderSummary {
  name: FolderName;
  emailCount: number;
  unreadCount: number;
}

// --- Seeding ---

export const BANK_KEYS = ['northbridge', 'balkantrust'] as const;
export type BankKey = typeof BANK_KEYS[number];

export const BANK_EMAIL_TYPES = [
  'credit_card_overdraft',
  'terms_conditions',
  'security_alerts',
  'statements',
  'promotional',
] as const;
export type BankEmailType = typeof BANK_EMAIL_TYPES[number];

// --- Service payloads ---

export interface SendEmailPayload {
  to: string[];
  subject: string;
  body: string;
  cc?: string[];
  priority?: EmailPriority;
}

export type DeleteOutcome = 'trashed' | 'purged';

export interface InboxStatus {
  totalEmails: number;
  bankEmails: number;
  regularEmails: number;
  unreadEmails: number;
}
