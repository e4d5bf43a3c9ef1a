import { EmailPriority, EmailStatus, FolderName } from '../../types';

/**
 * Wire shapes returned to the agent. Keys are snake_case to match the
 * argument names tools are called with.
 */

export interface EmailSummaryItem {
  id: string;
  subject: string;
  sender: string;
  date: string;
  status: EmailStatus;
  priority: EmailPriority;
}

export interface SearchResultItem extends EmailSummaryItem {
  folder: string;
}

export interface AttachmentItem {
  id: string;
  filename: string;
  size: number;
  content_type: string;
}

export interface EmailDetail {
  id: string;
  subject: string;
  sender: string;
  recipients: string[];
  cc: string[];
  bcc: string[];
  body: string;
  html_body: string | null;
  timestamp: string;
  status: EmailStatus;
  priority: EmailPriority;
  folder: string;
  attachments: AttachmentItem[];
  thread_id: string | null;
  in_reply_to: string | null;
  tags: string[];
}

export interface FolderSummaryItem {
  name: FolderName;
  display_name: string;
  email_count: number;
  unread_count: number;
}

export interface GeneratedEmailItem {
  id: string;
  subject: string;
  sender: string;
}

export interface GeneratedBankEmailItem extends GeneratedEmailItem {
  type: string;
  bank: string;
  priority: EmailPriority;
}

type Failure<Echo> = { success: false; error: string } & Echo;

export interface ListEmailsResult {
  success: true;
  emails: EmailSummaryItem[];
  folder: string;
  count: number;
  limit: number;
  offset: number;
  message?: string;
}

export type ReadEmailResult =
  | { success: true; email: EmailDetail }
  | Failure<{ email_id: string; email: null }>;

export interface SearchEmailsResult {
  success: true;
  emails: SearchResultItem[];
  query: string;
  folder: string | null;
  count: number;
  message?: string;
}

export type MarkEmailReadResult =
  | { success: true; message: string; email_id: string }
  | Failure<{ email_id: string }>;

export type DeleteEmailResult =
  | { success: true; message: string; email_id: string; permanent: boolean }
  | Failure<{ email_id: string }>;

export type MoveEmailResult =
  | { success: true; message: string; email_id: string; target_folder: string }
  | Failure<{ email_id: string; target_folder: string }>;

export interface SendEmailResult {
  success: true;
  message: string;
  email_id: string;
  to: string[];
  subject: string;
  cc: string[];
  priority: EmailPriority;
}

export interface FolderSummaryResult {
  success: true;
  folders: FolderSummaryItem[];
  total_folders: number;
}

export interface InboxStatusResult {
  success: true;
  status: 'empty' | 'initialized';
  initialized: boolean;
  total_emails: number;
  bank_emails: number;
  regular_emails: number;
  unread_emails: number;
  message: string;
}

export interface InitializeInboxResult {
  success: true;
  action: 'initialized' | 'skipped';
  message: string;
  total_emails: number;
  bank_emails: number;
  regular_emails: number;
}

export interface GenerateSampleEmailsResult {
  success: true;
  generated_emails: GeneratedEmailItem[];
  count: number;
  message: string;
}

export interface GenerateBankEmailsResult {
  success: true;
  generated_emails: GeneratedBankEmailItem[];
  count: number;
  message: string;
}

export interface ToolResultMap {
  list_emails: ListEmailsResult;
  read_email: ReadEmailResult;
  search_emails: SearchEmailsResult;
  mark_email_read: MarkEmailReadResult;
  delete_email: DeleteEmailResult;
  move_email: MoveEmailResult;
  send_email: SendEmailResult;
  get_folder_summary: FolderSummaryResult;
  get_inbox_status: InboxStatusResult;
  initialize_email_inbox: InitializeInboxResult;
  generate_sample_emails: GenerateSampleEmailsResult;
  generate_bank_emails: GenerateBankEmailsResult;
}

export type ToolName = keyof ToolResultMap;
export type ToolResult = ToolResultMap[ToolName];
