import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { InMemoryMailboxStore } from './infrastructure/repositories/InMemoryMailboxStore';
import { loadSeedCatalog, SeedCatalog } from './infrastructure/seed/SeedCatalog';
import { MailboxService } from './application/services/MailboxService';
import { SeedService } from './application/services/SeedService';
import { MailboxTools } from './application/tools/MailboxTools';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { IEventBus } from './domain/events/IEventBus';
import { IMailboxStore } from './domain/repositories/IMailboxStore';

/**
 * Dependency injection container.
 * Wires together all application components. The mailbox store is
 * created here once and handed to everything that needs it.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  idGenerator: IIdGenerator;
  eventBus: IEventBus;
  seedCatalog: SeedCatalog;

  // Storage
  mailboxStore: IMailboxStore;

  // Services
  mailboxService: MailboxService;
  seedService: SeedService;
  mailboxTools: MailboxTools;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Create and wire up all dependencies.
 */
export function createContainer(config: Config = new Config()): Container {
  // 1. Infrastructure - Core
  const logger = new ConsoleLogger(config.log.level, {}, config.log.format);
  const idGenerator = new TimestampIdGenerator();
  const eventBus = new InMemoryEventBus(logger);
  const seedCatalog = loadSeedCatalog();

  // 2. Storage
  const mailboxStore = new InMemoryMailboxStore(idGenerator, logger.child({ component: 'mailbox' }));

  // 3. Services
  const { userAddress, maxGenerate } = config.mailbox;
  const mailboxService = new MailboxService(mailboxStore, eventBus, logger, userAddress);
  const seedService = new SeedService(mailboxService, seedCatalog, logger, { userAddress });
  const mailboxTools = new MailboxTools(mailboxService, seedService, logger, { maxGenerate });

  return {
    config,
    logger,
    idGenerator,
    eventBus,
    seedCatalog,
    mailboxStore,
    mailboxService,
    seedService,
    mailboxTools,

    async initialize() {
      logger.info('Initializing container...');

      if (config.mailbox.seedOnStart) {
        await seedService.initializeInbox();
      }

      logger.info('Container initialized');
    },

    async shutdown() {
      logger.info('Shutting down container...');
      eventBus.removeAllListeners();
      logger.info('Container shutdown complete');
    }
  };
}
