import { Email, FolderSummary } from '../../types';
import { MailboxService } from '../services/MailboxService';
import { SeedService } from '../services/SeedService';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';
import {
  emailIdArgs,
  generateArgs,
  listEmailsArgs,
  moveEmailArgs,
  noArgs,
  parseToolArgs,
  searchEmailsArgs,
  sendEmailArgs,
} from './toolSchemas';
import {
  DeleteEmailResult,
  EmailDetail,
  EmailSummaryItem,
  FolderSummaryItem,
  FolderSummaryResult,
  GenerateBankEmailsResult,
  GenerateSampleEmailsResult,
  InboxStatusResult,
  InitializeInboxResult,
  ListEmailsResult,
  MarkEmailReadResult,
  MoveEmailResult,
  ReadEmailResult,
  SearchEmailsResult,
  SendEmailResult,
  ToolName,
  ToolResult,
} from './toolResults';

export const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  list_emails: 'List emails in a folder (inbox, sent, drafts, trash, spam, archive), newest first.',
  read_email: 'Read the full content of an email by ID. Unread emails are marked as read.',
  search_emails: 'Search emails by subject, sender or body text, optionally within one folder.',
  mark_email_read: 'Mark an unread email as read.',
  delete_email: 'Move an email to trash, or delete it permanently if it is already in trash.',
  move_email: 'Move an email to another folder.',
  send_email: 'Send a new email. The message is filed under sent.',
  get_folder_summary: 'Summarize every folder with its email and unread counts.',
  get_inbox_status: 'Report mailbox totals and whether it has been initialized.',
  initialize_email_inbox: 'Populate an empty mailbox with the starter emails.',
  generate_sample_emails: 'Simulate receiving generic emails.',
  generate_bank_emails: 'Simulate receiving templated bank emails.',
};

const TOOL_NAMES: ToolName[] = [
  'list_emails',
  'read_email',
  'search_emails',
  'mark_email_read',
  'delete_email',
  'move_email',
  'send_email',
  'get_folder_summary',
  'get_inbox_status',
  'initialize_email_inbox',
  'generate_sample_emails',
  'generate_bank_emails',
];

export interface MailboxToolsOptions {
  maxGenerate: number;
}

function toSummaryItem(email: Email): EmailSummaryItem {
  return {
    id: email.id,
    subject: email.subject,
    sender: email.sender,
    date: new Date(email.timestamp).toISOString(),
    status: email.status,
    priority: email.priority,
  };
}

function toDetail(email: Email): EmailDetail {
  return {
    id: email.id,
    subject: email.subject,
    sender: email.sender,
    recipients: email.recipients,
    cc: email.cc,
    bcc: email.bcc,
    body: email.body,
    html_body: email.htmlBody,
    timestamp: new Date(email.timestamp).toISOString(),
    status: email.status,
    priority: email.priority,
    folder: email.folder,
    attachments: email.attachments.map(a => ({
      id: a.attachmentId,
      filename: a.filename,
      size: a.size,
      content_type: a.contentType,
    })),
    thread_id: email.threadId,
    in_reply_to: email.inReplyTo,
    tags: email.tags,
  };
}

function toFolderItem(folder: FolderSummary): FolderSummaryItem {
  return {
    name: folder.name,
    display_name: folder.name.charAt(0).toUpperCase() + folder.name.slice(1),
    email_count: folder.emailCount,
    unread_count: folder.unreadCount,
  };
}

/**
 * Presents the mailbox as named tools for an agent.
 *
 * Arguments arrive loosely typed and are validated here; a malformed
 * argument or an unknown priority throws ValidationError. Lookups that
 * miss come back as `success: false` results echoing the inputs.
 */
export class MailboxTools {
  constructor(
    private mailboxService: MailboxService,
    private seedService: SeedService,
    private logger: ILogger,
    private options: MailboxToolsOptions
  ) {}

  catalog(): Array<{ name: ToolName; description: string }> {
    return TOOL_NAMES.map(name => ({ name, description: TOOL_DESCRIPTIONS[name] }));
  }

  /**
   * Dispatch a tool call by name.
   * @throws {NotFoundError} for an unknown tool name
   * @throws {ValidationError} for malformed arguments
   */
  async invoke(name: string, args: unknown): Promise<ToolResult> {
    const tool = TOOL_NAMES.find(t => t === name);
    if (!tool) {
      throw new NotFoundError('Tool', name);
    }
    this.logger.debug(`Tool call: ${tool}`);

    switch (tool) {
      case 'list_emails': return this.listEmails(args);
      case 'read_email': return this.readEmail(args);
      case 'search_emails': return this.searchEmails(args);
      case 'mark_email_read': return this.markEmailRead(args);
      case 'delete_email': return this.deleteEmail(args);
      case 'move_email': return this.moveEmail(args);
      case 'send_email': return this.sendEmail(args);
      case 'get_folder_summary': return this.getFolderSummary(args);
      case 'get_inbox_status': return this.getInboxStatus(args);
      case 'initialize_email_inbox': return this.initializeEmailInbox(args);
      case 'generate_sample_emails': return this.generateSampleEmails(args);
      case 'generate_bank_emails': return this.generateBankEmails(args);
    }
  }

  async listEmails(args: unknown): Promise<ListEmailsResult> {
    const { folder, limit, offset } = parseToolArgs('list_emails', listEmailsArgs, args);
    const emails = await this.mailboxService.listEmails(folder, limit, offset);

    return {
      success: true,
      emails: emails.map(toSummaryItem),
      folder,
      count: emails.length,
      limit,
      offset,
      ...(emails.length === 0 ? { message: `No emails found in ${folder} folder.` } : {}),
    };
  }

  async readEmail(args: unknown): Promise<ReadEmailResult> {
    const { email_id } = parseToolArgs('read_email', emailIdArgs, args);
    const email = await this.mailboxService.readEmail(email_id);

    if (!email) {
      return { success: false, error: `Email with ID ${email_id} not found.`, email_id, email: null };
    }
    return { success: true, email: toDetail(email) };
  }

  async searchEmails(args: unknown): Promise<SearchEmailsResult> {
    const { query, folder } = parseToolArgs('search_emails', searchEmailsArgs, args);
    const results = await this.mailboxService.searchEmails(query, folder ?? undefined);
    const scope = folder ? ` in ${folder}` : '';

    return {
      success: true,
      emails: results.map(email => ({ ...toSummaryItem(email), folder: email.folder })),
      query,
      folder: folder ?? null,
      count: results.length,
      ...(results.length === 0 ? { message: `No emails found matching '${query}'${scope}.` } : {}),
    };
  }

  async markEmailRead(args: unknown): Promise<MarkEmailReadResult> {
    const { email_id } = parseToolArgs('mark_email_read', emailIdArgs, args);

    if (await this.mailboxService.markAsRead(email_id)) {
      return { success: true, message: `Email ${email_id} marked as read.`, email_id };
    }
    return {
      success: false,
      error: `Could not mark email ${email_id} as read. Email not found or already read.`,
      email_id,
    };
  }

  async deleteEmail(args: unknown): Promise<DeleteEmailResult> {
    const { email_id } = parseToolArgs('delete_email', emailIdArgs, args);
    const outcome = await this.mailboxService.deleteEmail(email_id);

    switch (outcome) {
      case 'trashed':
        return { success: true, message: `Email ${email_id} moved to trash.`, email_id, permanent: false };
      case 'purged':
        return { success: true, message: `Email ${email_id} permanently deleted.`, email_id, permanent: true };
      default:
        return { success: false, error: `Could not delete email ${email_id}. Email not found.`, email_id };
    }
  }

  async moveEmail(args: unknown): Promise<MoveEmailResult> {
    const { email_id, target_folder } = parseToolArgs('move_email', moveEmailArgs, args);

    if (await this.mailboxService.moveEmail(email_id, target_folder)) {
      return {
        success: true,
        message: `Email ${email_id} moved to ${target_folder} folder.`,
        email_id,
        target_folder,
      };
    }
    return {
      success: false,
      error: `Could not move email ${email_id} to ${target_folder}. Email or folder not found.`,
      email_id,
      target_folder,
    };
  }

  async sendEmail(args: unknown): Promise<SendEmailResult> {
    const { to, subject, body, cc, priority } = parseToolArgs('send_email', sendEmailArgs, args);
    const email = await this.mailboxService.sendEmail({ to, subject, body, cc, priority });

    return {
      success: true,
      message: 'Email sent successfully!',
      email_id: email.id,
      to,
      subject,
      cc,
      priority,
    };
  }

  async getFolderSummary(args?: unknown): Promise<FolderSummaryResult> {
    parseToolArgs('get_folder_summary', noArgs, args);
    const folders = this.mailboxService.getFolderSummary().map(toFolderItem);
    return { success: true, folders, total_folders: folders.length };
  }

  async getInboxStatus(args?: unknown): Promise<InboxStatusResult> {
    parseToolArgs('get_inbox_status', noArgs, args);
    const status = this.mailboxService.getStatus();
    const initialized = status.totalEmails > 0;

    return {
      success: true,
      status: initialized ? 'initialized' : 'empty',
      initialized,
      total_emails: status.totalEmails,
      bank_emails: status.bankEmails,
      regular_emails: status.regularEmails,
      unread_emails: status.unreadEmails,
      message: initialized
        ? `Mailbox contains ${status.totalEmails} emails (${status.bankEmails} bank emails, ${status.unreadEmails} unread)`
        : 'Mailbox is empty. Use initialize_email_inbox to populate it with sample emails.',
    };
  }

  async initializeEmailInbox(args?: unknown): Promise<InitializeInboxResult> {
    parseToolArgs('initialize_email_inbox', noArgs, args);
    const outcome = await this.seedService.initializeInbox();
    const status = this.mailboxService.getStatus();

    return {
      success: true,
      action: outcome.action,
      message: outcome.action === 'initialized'
        ? 'Mailbox initialized successfully'
        : `Mailbox already initialized with ${outcome.existing} emails`,
      total_emails: status.totalEmails,
      bank_emails: status.bankEmails,
      regular_emails: status.regularEmails,
    };
  }

  async generateSampleEmails(args?: unknown): Promise<GenerateSampleEmailsResult> {
    const { count } = parseToolArgs('generate_sample_emails', generateArgs(5, this.options.maxGenerate), args);
    const emails = await this.seedService.generateSampleEmails(count);

    return {
      success: true,
      generated_emails: emails.map(e => ({ id: e.id, subject: e.subject, sender: e.sender })),
      count: emails.length,
      message: `Generated ${emails.length} sample emails`,
    };
  }

  async generateBankEmails(args?: unknown): Promise<GenerateBankEmailsResult> {
    const { count } = parseToolArgs('generate_bank_emails', generateArgs(10, this.options.maxGenerate), args);
    const generated = await this.seedService.generateBankEmails(count);

    return {
      success: true,
      generated_emails: generated.map(({ email, type, bank }) => ({
        id: email.id,
        subject: email.subject,
        sender: email.sender,
        type,
        bank,
        priority: email.priority,
      })),
      count: generated.length,
      message: `Generated ${generated.length} bank emails`,
    };
  }
}
