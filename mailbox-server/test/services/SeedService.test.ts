import { SeedService } from '../../src/application/services/SeedService';
import { MailboxService } from '../../src/application/services/MailboxService';
import { InMemoryMailboxStore } from '../../src/infrastructure/repositories/InMemoryMailboxStore';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { loadSeedCatalog } from '../../src/infrastructure/seed/SeedCatalog';
import { BASE_TIME, createMockLogger, createTestEmail, SequentialIdGenerator, sequenceRandom } from '../helpers';

describe('SeedService', () => {
  const catalog = loadSeedCatalog();
  let store: InMemoryMailboxStore;
  let mailboxService: MailboxService;
  let logger: ReturnType<typeof createMockLogger>;

  function createSeedService(random: () => number): SeedService {
    return new SeedService(mailboxService, catalog, logger, {
      userAddress: 'user@example.com',
      random,
      now: () => BASE_TIME,
    });
  }

  beforeEach(() => {
    logger = createMockLogger();
    store = new InMemoryMailboxStore(new SequentialIdGenerator(), logger, { now: () => BASE_TIME });
    mailboxService = new MailboxService(store, new InMemoryEventBus(logger), logger, 'user@example.com');
  });

  describe('initializeInbox', () => {
    it('should load the starter messages into an empty mailbox', async () => {
      const outcome = await createSeedService(() => 0).initializeInbox();

      expect(outcome.action).toBe('initialized');
      expect(store.size()).toBe(8);
      expect(store.folders()[0]).toEqual({ name: 'inbox', emailCount: 8, unreadCount: 8 });
      expect(mailboxService.getStatus()).toEqual({
        totalEmails: 8,
        bankEmails: 5,
        regularEmails: 3,
        unreadEmails: 8,
      });
      expect(store.list('inbox', 1)[0].id).toBe('northbridge-001-overdraft');
    });

    it('should skip a mailbox that already has mail', async () => {
      store.add(createTestEmail());

      const outcome = await createSeedService(() => 0).initializeInbox();

      expect(outcome).toEqual({ action: 'skipped', existing: 1 });
      expect(store.size()).toBe(1);
    });

    it('should be idempotent across repeated calls', async () => {
      const seeder = createSeedService(() => 0);
      await seeder.initializeInbox();

      expect(await seeder.initializeInbox()).toEqual({ action: 'skipped', existing: 8 });
    });
  });

  describe('generateSampleEmails', () => {
    it('should add the requested number of inbox messages', async () => {
      const emails = await createSeedService(sequenceRandom([0.1, 0.3, 0.7, 0.9])).generateSampleEmails(5);

      expect(emails).toHaveLength(5);
      expect(store.folders()[0].emailCount).toBe(5);
      for (const email of emails) {
        expect(email.timestamp).toBeLessThanOrEqual(BASE_TIME);
        expect(email.recipients).toEqual(['user@example.com']);
      }
      expect(logger.info).toHaveBeenCalledWith('Generated 5 sample emails');
    });
  });

  describe('generateBankEmails', () => {
    it('should report the bank and type chosen for each message', async () => {
      const generated = await createSeedService(() => 0).generateBankEmails(2);

      expect(generated.map(g => [g.bank, g.type])).toEqual([
        ['northbridge', 'credit_card_overdraft'],
        ['northbridge', 'credit_card_overdraft'],
      ]);
      expect(generated[0].email.tags).toEqual(['banking', 'northbridge', 'credit_card_overdraft']);
      expect(mailboxService.getStatus().bankEmails).toBe(2);
    });

    it('should spread plans over banks and types', async () => {
      // bank roll, then type roll, per planned message
      const generated = await createSeedService(sequenceRandom([0.6, 0.9])).generateBankEmails(1);

      expect(generated[0].bank).toBe('balkantrust');
      expect(generated[0].type).toBe('promotional');
      expect(generated[0].email.subject).toMatch(/Balkan Trust|Special Rates/);
    });
  });
});
