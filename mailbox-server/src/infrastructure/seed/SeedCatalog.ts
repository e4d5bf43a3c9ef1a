import { z } from 'zod';
import { BankEmailType, BankKey, EMAIL_PRIORITIES } from '../../types';
import samplePoolJson from './sample-pool.json';
import bankTemplatesJson from './bank-templates.json';
import starterInboxJson from './starter-inbox.json';

// --- Schemas for the bundled seed data ---

const phrases = z.array(z.string().min(1)).min(1);

const samplePoolSchema = z.object({
  senders: phrases,
  subjects: phrases,
  bodies: phrases,
});

const bankSchema = z.object({
  displayName: z.string().min(1),
  senders: phrases,
});

const templateSchema = z.object({
  subjects: phrases,
  bodies: z.object({
    northbridge: phrases,
    balkantrust: phrases,
  }),
});

const bankTemplatesSchema = z.object({
  banks: z.object({
    northbridge: bankSchema,
    balkantrust: bankSchema,
  }),
  locations: phrases,
  merchants: phrases,
  templates: z.object({
    credit_card_overdraft: templateSchema,
    terms_conditions: templateSchema,
    security_alerts: templateSchema,
    statements: templateSchema,
    promotional: templateSchema,
  }),
});

const starterEmailSchema = z.object({
  id: z.string().min(1),
  subject: z.string().min(1),
  sender: z.string().min(1),
  body: z.string().min(1),
  ageMinutes: z.number().int().nonnegative(),
  priority: z.enum(EMAIL_PRIORITIES),
  attachments: z.array(z.object({
    filename: z.string().min(1),
    size: z.number().int().nonnegative(),
    contentType: z.string().min(1),
  })),
  tags: z.array(z.string()),
});

export type SamplePool = z.infer<typeof samplePoolSchema>;
export type BankProfile = z.infer<typeof bankSchema>;
export type BankTemplate = z.infer<typeof templateSchema>;
export type StarterEmail = z.infer<typeof starterEmailSchema>;

/**
 * Read-only access to the data the seed generators draw from.
 */
export class SeedCatalog {
  constructor(
    readonly samples: SamplePool,
    private readonly bankData: z.infer<typeof bankTemplatesSchema>,
    readonly starterInbox: StarterEmail[]
  ) {}

  bank(key: BankKey): BankProfile {
    return this.bankData.banks[key];
  }

  template(type: BankEmailType): BankTemplate {
    return this.bankData.templates[type];
  }

  get locations(): string[] {
    return this.bankData.locations;
  }

  get merchants(): string[] {
    return this.bankData.merchants;
  }
}

/**
 * Parse the bundled JSON files.
 * @throws {z.ZodError} when a data file does not match its schema
 */
export function loadSeedCatalog(): SeedCatalog {
  return new SeedCatalog(
    samplePoolSchema.parse(samplePoolJson),
    bankTemplatesSchema.parse(bankTemplatesJson),
    z.array(starterEmailSchema).parse(starterInboxJson)
  );
}
