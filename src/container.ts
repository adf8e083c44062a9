import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { FileSystemChatRepository } from './infrastructure/repositories/FileSystemChatRepository';
import { FileSystemEngagementRepository } from './infrastructure/repositories/FileSystemEngagementRepository';
import { FileSystemAssignmentRepository } from './infrastructure/repositories/FileSystemAssignmentRepository';
import { FileSystemProjectRepository } from './infrastructure/repositories/FileSystemProjectRepository';
import { FileSystemTaskRepository } from './infrastructure/repositories/FileSystemTaskRepository';
import { FileSystemProjectAssignmentRepository } from './infrastructure/repositories/FileSystemProjectAssignmentRepository';
import { FileSystemPreferenceRepository } from './infrastructure/repositories/FileSystemPreferenceRepository';
import { OpenAICompletionOracle } from './infrastructure/oracle/OpenAICompletionOracle';
import { WebhookChannelNotifier } from './infrastructure/notifications/WebhookChannelNotifier';
import { LoggingNotifier } from './infrastructure/notifications/LoggingNotifier';
import { FileSystemPromptLoader } from './infrastructure/prompts/FileSystemPromptLoader';
import { InMemoryRelevanceCache } from './infrastructure/cache/InMemoryRelevanceCache';
import { EngagementService } from './application/services/EngagementService';
import { AssignmentService } from './application/services/AssignmentService';
import { PreferenceService } from './application/services/PreferenceService';
import { CatalogService } from './application/services/CatalogService';
import { SkillTaskResolver } from './application/services/SkillTaskResolver';
import { TaskRecommendationValidator } from './application/services/TaskRecommendationValidator';
import { TaskRelevanceChecker } from './application/services/TaskRelevanceChecker';
import { ToolDispatcher } from './application/conversation/ToolDispatcher';
import { ConversationOrchestrator } from './application/conversation/ConversationOrchestrator';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { Clock, systemClock } from './domain/common/Clock';
import { IEventBus } from './domain/events/IEventBus';
import { IChatRepository } from './domain/repositories/IChatRepository';
import { IEngagementRepository } from './domain/repositories/IEngagementRepository';
import { IAssignmentRepository } from './domain/repositories/IAssignmentRepository';
import { IProjectRepository } from './domain/repositories/IProjectRepository';
import { ITaskRepository } from './domain/repositories/ITaskRepository';
import { IProjectAssignmentRepository } from './domain/repositories/IProjectAssignmentRepository';
import { IPreferenceRepository } from './domain/repositories/IPreferenceRepository';
import { ICompletionOracle } from './domain/services/ICompletionOracle';
import { INotifier } from './domain/services/INotifier';
import { IPromptLoader } from './domain/services/IPromptLoader';

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  idGenerator: IIdGenerator;
  eventBus: IEventBus;
  clock: Clock;

  // Collaborators
  oracle: ICompletionOracle;
  notifier: INotifier;
  prompts: IPromptLoader;

  // Repositories
  chatRepo: IChatRepository;
  engagementRepo: IEngagementRepository;
  assignmentRepo: IAssignmentRepository;
  projectRepo: IProjectRepository;
  taskRepo: ITaskRepository;
  projectAssignmentRepo: IProjectAssignmentRepository;
  preferenceRepo: IPreferenceRepository;

  // Services
  engagementService: EngagementService;
  assignmentService: AssignmentService;
  preferenceService: PreferenceService;
  catalogService: CatalogService;
  orchestrator: ConversationOrchestrator;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Replaceable collaborators. Tests pass a scripted oracle and a recording
 * notifier here instead of reaching the network.
 */
export interface ContainerOverrides {
  config?: Config;
  logger?: ILogger;
  clock?: Clock;
  oracle?: ICompletionOracle;
  notifier?: INotifier;
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  // 1. Configuration
  const config = overrides.config ?? new Config();

  // 2. Infrastructure - Core
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? new ConsoleLogger(config.log.level, config.log.format);
  const idGenerator = new TimestampIdGenerator(clock);
  const eventBus = new InMemoryEventBus(logger);

  // 3. Repositories
  const chatRepo = new FileSystemChatRepository(config.dataDir, logger);
  const engagementRepo = new FileSystemEngagementRepository(config.dataDir, logger);
  const assignmentRepo = new FileSystemAssignmentRepository(config.dataDir, logger, clock);
  const projectRepo = new FileSystemProjectRepository(config.dataDir, idGenerator, logger, clock);
  const taskRepo = new FileSystemTaskRepository(config.dataDir, idGenerator, logger, clock);
  const projectAssignmentRepo = new FileSystemProjectAssignmentRepository(config.dataDir, logger, clock);
  const preferenceRepo = new FileSystemPreferenceRepository(config.dataDir, logger, clock);

  // 4. External collaborators
  const oracle = overrides.oracle ?? new OpenAICompletionOracle(config.oracle, logger);
  const notifier = overrides.notifier ?? (config.channel.webhookUrl
    ? new WebhookChannelNotifier(config.channel.webhookUrl, config.channel, logger)
    : new LoggingNotifier(logger));
  const prompts = new FileSystemPromptLoader(config.promptsDir, logger);

  // 5. Services
  const engagementService = new EngagementService(engagementRepo, eventBus, logger, clock);
  const assignmentService = new AssignmentService(assignmentRepo, taskRepo, projectRepo, eventBus, logger, clock);
  const relevanceChecker = new TaskRelevanceChecker(oracle, prompts, new InMemoryRelevanceCache(), logger);
  const preferenceService = new PreferenceService(
    preferenceRepo,
    projectRepo,
    engagementService,
    assignmentService,
    relevanceChecker,
    eventBus,
    logger
  );
  const catalogService = new CatalogService(
    projectRepo,
    taskRepo,
    projectAssignmentRepo,
    preferenceService,
    eventBus,
    logger
  );
  const resolver = new SkillTaskResolver(taskRepo, projectRepo, projectAssignmentRepo, assignmentRepo, logger);
  const validator = new TaskRecommendationValidator(taskRepo, projectRepo, projectAssignmentRepo, assignmentRepo, logger);
  const tools = new ToolDispatcher(resolver, assignmentService, logger);

  const orchestrator = new ConversationOrchestrator({
    engagement: engagementService,
    assignments: assignmentService,
    preferences: preferenceService,
    catalog: catalogService,
    validator,
    tools,
    chatRepo,
    oracle,
    prompts,
    notifier,
    eventBus,
    idGenerator,
    logger,
    clock,
    options: config.conversation
  });

  const container: Container = {
    config,
    logger,
    idGenerator,
    eventBus,
    clock,
    oracle,
    notifier,
    prompts,
    chatRepo,
    engagementRepo,
    assignmentRepo,
    projectRepo,
    taskRepo,
    projectAssignmentRepo,
    preferenceRepo,
    engagementService,
    assignmentService,
    preferenceService,
    catalogService,
    orchestrator,

    async initialize() {
      logger.info('Initializing container...');

      // Initialize repositories
      await chatRepo.initialize();
      await engagementRepo.initialize();
      await assignmentRepo.initialize();
      await projectRepo.initialize();
      await taskRepo.initialize();
      await projectAssignmentRepo.initialize();
      await preferenceRepo.initialize();

      // Saved preferences are announced to the learner on the channel
      eventBus.on('preferences:updated', async (prefs) => {
        await orchestrator.announcePreferences(prefs);
      });

      logger.info('Container initialized');
    },

    async shutdown() {
      logger.info('Shutting down container...');
      eventBus.removeAllListeners();
      logger.info('Container shutdown complete');
    }
  };

  return container;
}
