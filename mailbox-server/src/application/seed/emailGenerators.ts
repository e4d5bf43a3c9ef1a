import { BankEmailType, BankKey, EmailPriority, NewEmail } from '../../types';
import { SeedCatalog } from '../../infrastructure/seed/SeedCatalog';
import { Random, pickOne, pickWeighted, randomInt } from './random';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const SAMPLE_PRIORITY_WEIGHTS: ReadonlyArray<readonly [EmailPriority, number]> = [
  ['low', 10],
  ['normal', 70],
  ['high', 15],
  ['urgent', 5],
];

export interface GeneratorContext {
  catalog: SeedCatalog;
  random: Random;
  /** Reference time, epoch millis */
  now: number;
  userAddress: string;
}

export type TemplateParams = Record<string, string>;

/**
 * Fill `{name}` placeholders. Unknown names are left as written.
 */
export function renderTemplate(template: string, params: TemplateParams): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => params[key] ?? match);
}

export function formatAmount(value: number, decimals: number = 2): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `05 March 2025` (UTC) */
export function formatLongDate(ts: number): string {
  const d = new Date(ts);
  return `${pad2(d.getUTCDate())} ${MONTHS[d.getUTCMonth()]} ${d.getUTCFullYear()}`;
}

/** `05/03/2025` (UTC) */
export function formatShortDate(ts: number): string {
  const d = new Date(ts);
  return `${pad2(d.getUTCDate())}/${pad2(d.getUTCMonth() + 1)}/${d.getUTCFullYear()}`;
}

export interface StatementPeriod {
  month: string;
  year: string;
  lastDay: number;
}

/**
 * The calendar month `monthsBack` whole months before `now` (UTC).
 */
export function statementPeriod(now: number, monthsBack: number): StatementPeriod {
  const ref = new Date(now);
  const start = new Date(Date.UTC(ref.getUTCFullYear(), ref.getUTCMonth() - monthsBack, 1));
  const end = new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 0));
  return {
    month: MONTHS[start.getUTCMonth()],
    year: String(start.getUTCFullYear()),
    lastDay: end.getUTCDate(),
  };
}

function bankParams(ctx: GeneratorContext, type: BankEmailType, bank: BankKey): TemplateParams {
  const { random, now, catalog } = ctx;
  const common: TemplateParams = {
    bank_name: catalog.bank(bank).displayName,
    account_number: `****${randomInt(random, 1000, 9999)}`,
    last_four: String(randomInt(random, 1000, 9999)),
  };

  switch (type) {
    case 'credit_card_overdraft': {
      const creditLimit = randomInt(random, 1000, 10000);
      const balance = creditLimit + randomInt(random, 50, 500);
      const fee = pickOne(random, [25, 35, 50]);
      return {
        ...common,
        balance: formatAmount(balance),
        credit_limit: formatAmount(creditLimit),
        overlimit_amount: formatAmount(balance - creditLimit),
        fee: formatAmount(fee),
      };
    }
    case 'terms_conditions':
      return {
        ...common,
        effective_date: formatLongDate(now + randomInt(random, 30, 60) * DAY),
      };
    case 'security_alerts':
      return {
        ...common,
        amount: formatAmount(randomInt(random, 50, 2000)),
        transaction_date: formatShortDate(now - randomInt(random, 0, 3) * DAY),
        location: pickOne(random, catalog.locations),
        merchant: pickOne(random, catalog.merchants),
      };
    case 'statements': {
      const { month, year, lastDay } = statementPeriod(now, randomInt(random, 1, 12));
      const opening = randomInt(random, 500, 5000);
      const closing = opening + randomInt(random, -200, 300);
      return {
        ...common,
        statement_month: month,
        statement_year: year,
        start_date: `01 ${month} ${year}`,
        end_date: `${lastDay} ${month} ${year}`,
        opening_balance: formatAmount(opening),
        closing_balance: formatAmount(closing),
        transaction_count: String(randomInt(random, 15, 45)),
        fees: formatAmount(randomInt(random, 0, 25)),
        interest: formatAmount(randomInt(random, 0, 15)),
      };
    }
    case 'promotional':
      return {
        ...common,
        credit_limit: formatAmount(randomInt(random, 2000, 15000), 0),
        expiry_date: formatLongDate(now + randomInt(random, 14, 45) * DAY),
      };
  }
}

function bankPriority(random: Random, type: BankEmailType): EmailPriority {
  switch (type) {
    case 'credit_card_overdraft':
    case 'security_alerts':
      return pickOne<EmailPriority>(random, ['high', 'urgent']);
    case 'terms_conditions':
      return 'high';
    default:
      return 'normal';
  }
}

/**
 * A generic message from the sample pools, received within the last week.
 */
export function buildSampleEmail(ctx: GeneratorContext): NewEmail {
  const { random, catalog, now } = ctx;
  const sender = pickOne(random, catalog.samples.senders);
  const subject = pickOne(random, catalog.samples.subjects);
  const body = pickOne(random, catalog.samples.bodies);
  const age = randomInt(random, 0, 7) * DAY + randomInt(random, 0, 23) * HOUR;

  return {
    subject,
    sender,
    recipients: [ctx.userAddress],
    body,
    timestamp: now - age,
    priority: pickWeighted(random, SAMPLE_PRIORITY_WEIGHTS),
  };
}

/**
 * A templated bank message, received within the last two weeks.
 */
export function buildBankEmail(ctx: GeneratorContext, type: BankEmailType, bank: BankKey): NewEmail {
  const { random, catalog, now } = ctx;
  const params = bankParams(ctx, type, bank);
  const template = catalog.template(type);

  const subject = renderTemplate(pickOne(random, template.subjects), params);
  const body = renderTemplate(pickOne(random, template.bodies[bank]), params);
  const sender = pickOne(random, catalog.bank(bank).senders);
  const priority = bankPriority(random, type);
  const age = randomInt(random, 0, 14) * DAY + randomInt(random, 0, 23) * HOUR;

  return {
    subject,
    sender,
    recipients: [ctx.userAddress],
    body,
    timestamp: now - age,
    priority,
    tags: ['banking', bank, type],
  };
}

/**
 * The fixed-id messages an empty mailbox is initialized with.
 */
export function buildStarterInbox(ctx: Omit<GeneratorContext, 'random'>): NewEmail[] {
  return ctx.catalog.starterInbox.map(entry => ({
    id: entry.id,
    subject: entry.subject,
    sender: entry.sender,
    recipients: [ctx.userAddress],
    body: entry.body,
    timestamp: ctx.now - entry.ageMinutes * MINUTE,
    priority: entry.priority,
    attachments: entry.attachments,
    tags: entry.tags,
  }));
}
