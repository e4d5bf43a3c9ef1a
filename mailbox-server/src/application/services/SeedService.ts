import { BANK_EMAIL_TYPES, BANK_KEYS, BankEmailType, BankKey, Email } from '../../types';
import { MailboxService } from './MailboxService';
import { SeedCatalog } from '../../infrastructure/seed/SeedCatalog';
import { ILogger } from '../../domain/common/ILogger';
import { Random, pickOne } from '../seed/random';
import { buildBankEmail, buildSampleEmail, buildStarterInbox, GeneratorContext } from '../seed/emailGenerators';

export interface SeedServiceOptions {
  userAddress: string;
  random?: Random;
  now?: () => number;
}

export interface GeneratedBankEmail {
  email: Email;
  type: BankEmailType;
  bank: BankKey;
}

export type InitializeOutcome =
  | { action: 'initialized'; emails: Email[] }
  | { action: 'skipped'; existing: number };

/**
 * Produces synthetic mail and feeds it through MailboxService.
 */
export class SeedService {
  private random: Random;
  private now: () => number;
  private userAddress: string;

  constructor(
    private mailboxService: MailboxService,
    private catalog: SeedCatalog,
    private logger: ILogger,
    options: SeedServiceOptions
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.userAddress = options.userAddress;
  }

  private context(): GeneratorContext {
    return {
      catalog: this.catalog,
      random: this.random,
      now: this.now(),
      userAddress: this.userAddress,
    };
  }

  /**
   * Load the starter messages, but only into an empty mailbox.
   */
  async initializeInbox(): Promise<InitializeOutcome> {
    if (!this.mailboxService.isEmpty()) {
      const existing = this.mailboxService.getStatus().totalEmails;
      this.logger.info(`Mailbox already holds ${existing} emails, skipping initialization`);
      return { action: 'skipped', existing };
    }

    const emails = await this.mailboxService.receiveMany(buildStarterInbox(this.context()));
    this.logger.info(`Mailbox initialized with ${emails.length} emails`);
    return { action: 'initialized', emails };
  }

  async generateSampleEmails(count: number): Promise<Email[]> {
    const ctx = this.context();
    const drafts = Array.from({ length: count }, () => buildSampleEmail(ctx));
    const emails = await this.mailboxService.receiveMany(drafts);
    this.logger.info(`Generated ${emails.length} sample emails`);
    return emails;
  }

  async generateBankEmails(count: number): Promise<GeneratedBankEmail[]> {
    const ctx = this.context();
    const plans = Array.from({ length: count }, () => ({
      bank: pickOne(this.random, BANK_KEYS),
      type: pickOne(this.random, BANK_EMAIL_TYPES),
    }));
    const emails = await this.mailboxService.receiveMany(
      plans.map(({ bank, type }) => buildBankEmail(ctx, type, bank))
    );
    this.logger.info(`Generated ${emails.length} bank emails`);
    return emails.map((email, i) => ({ email, ...plans[i] }));
  }
}
