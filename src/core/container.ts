import { join } from 'node:path';
import type { Logger } from '../types/logger.js';
import type { ITransport } from '../ports/transport.js';
import type { IResponseGenerator } from '../ports/response-generator.js';
import type { IDiscoverySource } from '../ports/discovery-source.js';
import type { IEvaluator } from '../ports/evaluator.js';
import { createLogger } from './logger.js';
import { FatalStartupFailure, describeCause } from './errors.js';
import { Orchestrator } from './orchestrator.js';
import { StatusReporter } from './status.js';
import { type MergedConfig, ConfigLoader } from '../config/index.js';
import {
  type DeferredStorage,
  createDeferredStorage,
  createJSONStorage,
  JsonMemoryStore,
  JsonPersonaStore,
} from '../storage/index.js';
import { ConsoleTransport } from '../channels/console.js';
import { RssDiscoverySource } from '../plugins/discovery/rss-source.js';
import { createOpenAICompatibleProvider } from '../plugins/providers/openai-compatible.js';
import { ModelResponseGenerator } from '../llm/model-response-generator.js';
import { GenerationSettings } from '../llm/generation-settings.js';
import {
  type ISafetyGate,
  createSafetyGate,
  CorrectionMechanism,
  ChangeLedger,
} from '../safety/index.js';
import {
  type IEthicsReviewer,
  EthicalFilter,
  PassThroughEthicalFilter,
  EthicalInsight,
  KeywordEthicalEvaluator,
  HeuristicEvaluator,
  ModelJudgeEvaluator,
  FallbackEvaluator,
} from '../ethics/index.js';
import {
  PersonaTransform,
  TemplateVoice,
  createPersonaState,
  describePersona,
} from '../persona/index.js';
import { InteractionPipeline } from '../pipeline/index.js';
import { PeriodicScheduler } from '../scheduler/periodic-scheduler.js';
import { createJobs } from '../scheduler/jobs.js';
import { DiscoveryBuffer, Explorer } from '../exploration/index.js';
import { ConversationInitiator } from '../initiation/conversation-initiator.js';
import { ReflectionEngine } from '../reflection/reflection-engine.js';
import { SelfImprovement } from '../improvement/self-improvement.js';
import { ExternalEvaluation } from '../evaluation/index.js';
import {
  type IDevelopmentMonitor,
  type IExternalValidator,
  DevelopmentMonitor,
  DisabledDevelopmentMonitor,
  ExternalValidator,
  DisabledExternalValidator,
} from '../monitoring/index.js';

/**
 * Collaborators that can be supplied instead of the defaults built from
 * configuration.
 */
export interface ContainerOptions {
  /** Directory holding agent.json (default: <DATA_PATH>/config) */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  transport?: ITransport;
  generator?: IResponseGenerator;
  discoverySource?: IDiscoverySource;
  /** Random source for topic choice and initiation */
  random?: () => number;
}

/**
 * Container holding all application dependencies.
 */
export interface Container {
  logger: Logger;
  config: MergedConfig;
  storage: DeferredStorage;
  transport: ITransport;
  memory: JsonMemoryStore;
  personaStore: JsonPersonaStore;
  persona: PersonaTransform;
  gate: ISafetyGate;
  correction: CorrectionMechanism;
  ethics: IEthicsReviewer;
  pipeline: InteractionPipeline;
  scheduler: PeriodicScheduler;
  ledger: ChangeLedger;
  status: StatusReporter;
  orchestrator: Orchestrator;
  /** Start background flushing, the transport and the control loop */
  start: () => Promise<void>;
  /** Stop the loop, persist everything and release resources. Idempotent. */
  shutdown: () => Promise<void>;
}

async function loadConfiguration(
  configPath: string,
  env: NodeJS.ProcessEnv
): Promise<{ config: MergedConfig; warnings: readonly string[] }> {
  const loader = new ConfigLoader(configPath, env);
  try {
    const config = await loader.load();
    return { config, warnings: loader.getWarnings() };
  } catch (error) {
    throw new FatalStartupFailure('config', describeCause(error), { cause: error });
  }
}

export interface Generators {
  /** Answers messages inside the pipeline; a single attempt per call */
  reply: IResponseGenerator;
  /** Reflection, judges, probes and insight; retries up to llm.maxRetries */
  background: IResponseGenerator;
}

/**
 * Build the model-backed generators. Both share the sampling settings that
 * self-improvement adjusts.
 */
export function createGenerators(
  llm: MergedConfig['llm'],
  personaPrompt: () => string,
  settings: GenerationSettings,
  logger: Logger
): Generators {
  const { baseUrl, model, apiKey, timeoutMs, maxRetries } = llm;
  if (!baseUrl || !model) {
    throw new FatalStartupFailure('llm', 'LLM_BASE_URL and LLM_MODEL must be set');
  }

  const connection = { baseUrl, model, apiKey: apiKey ?? undefined, timeout: timeoutMs };
  const replyProvider = createOpenAICompatibleProvider(
    { ...connection, name: 'reply-model', maxRetries: 0 },
    logger
  );
  const backgroundProvider = createOpenAICompatibleProvider(
    { ...connection, name: 'background-model', maxRetries },
    logger
  );
  logger.info({ baseUrl, model, backgroundRetries: maxRetries }, 'LLM provider configured');

  return {
    reply: new ModelResponseGenerator(replyProvider, personaPrompt, logger, settings),
    background: new ModelResponseGenerator(backgroundProvider, personaPrompt, logger, settings),
  };
}

/**
 * Create the application container.
 *
 * - Loads configuration from defaults, data/config/agent.json and the environment
 * - Restores the saved persona, or seeds one from configuration
 * - Swaps disabled components for pass-through implementations
 *
 * Throws FatalStartupFailure when a collaborator cannot be built.
 */
export async function createContainer(options: ContainerOptions = {}): Promise<Container> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? join(env['DATA_PATH'] ?? 'data', 'config');
  const { config, warnings } = await loadConfiguration(configPath, env);

  const logger: Logger =
    options.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
      toFile: config.logging.toFile,
    });
  for (const warning of warnings) {
    logger.warn(warning);
  }
  logger.info({ configPath }, 'Loaded configuration');

  // Storage
  const storage = createDeferredStorage(
    createJSONStorage(config.paths.state, { logger }),
    logger,
    { flushIntervalMs: config.storage.flushIntervalMs }
  );
  const memory = new JsonMemoryStore(storage, logger, {
    maxInteractions: config.storage.maxInteractions,
  });
  const personaStore = new JsonPersonaStore(storage, logger);
  const ledger = new ChangeLedger(storage, logger);
  const status = new StatusReporter(storage, logger);
  logger.info({ storagePath: config.paths.state }, 'Storage initialized');

  // Persona
  const saved = await personaStore.load();
  const persona = new PersonaTransform(
    saved ?? createPersonaState(config.persona),
    new TemplateVoice(),
    logger,
    config.traitModel
  );
  logger.info(
    { name: persona.name, restored: saved !== null, traits: persona.snapshot().traits },
    'Persona ready'
  );

  const settings = new GenerationSettings();
  const { reply: generator, background } = options.generator
    ? { reply: options.generator, background: options.generator }
    : createGenerators(config.llm, () => describePersona(persona.snapshot()), settings, logger);

  // Safety
  const gate = createSafetyGate(config.safety, logger);
  const correction = new CorrectionMechanism(
    {
      ...config.correction,
      categories: config.ethics.categories,
      blockedPatterns: config.safety.blockedPatterns,
    },
    logger
  );

  // Ethics
  const keywordEvaluator = new KeywordEthicalEvaluator(config.ethics.categories);
  const ethicsJudge = new ModelJudgeEvaluator(generator, 'ethics');
  const ethicsEvaluator: IEvaluator =
    config.ethics.evaluator === 'model'
      ? new FallbackEvaluator(ethicsJudge, keywordEvaluator, logger)
      : keywordEvaluator;
  const ethics: IEthicsReviewer = config.ethics.enabled
    ? new EthicalFilter(ethicsEvaluator, logger, { passThreshold: config.ethics.passThreshold })
    : new PassThroughEthicalFilter();

  const pipeline = new InteractionPipeline(
    { gate, memory, generator, persona, ethics, correction, logger },
    { context: config.context }
  );

  // Probes and test cases are answered the way a user would be, minus the gate
  const respond = async (prompt: string): Promise<string> => {
    const raw = await background.generate('', prompt);
    const voiced = persona.applyVoice(raw, { firstContact: false });
    return correction.review(voiced).text;
  };

  // Background work
  const random = options.random ?? Math.random;
  const interests = (): readonly string[] => persona.snapshot().interests;
  const buffer = new DiscoveryBuffer(config.exploration.maxDiscoveries);
  const source =
    options.discoverySource ?? new RssDiscoverySource(config.exploration.feeds, logger);
  const explorer = new Explorer(source, buffer, interests, config.exploration, logger, random);
  const initiator = new ConversationInitiator(
    buffer,
    interests,
    config.initiation,
    logger,
    random
  );
  const reflection = new ReflectionEngine(memory, background, config.reflection, logger);
  const improvement = new SelfImprovement(
    ledger,
    settings,
    () => pipeline.metrics().response_quality,
    config.improvement,
    logger
  );
  await improvement.restore();
  const evaluation = new ExternalEvaluation(
    respond,
    new FallbackEvaluator(new ModelJudgeEvaluator(background), new HeuristicEvaluator(), logger),
    storage,
    config.evaluation,
    logger
  );
  const monitor: IDevelopmentMonitor = config.monitoring.enabled
    ? new DevelopmentMonitor(() => ({ ...pipeline.metrics() }), config.monitoring, logger)
    : new DisabledDevelopmentMonitor();
  const safetyJudge = new ModelJudgeEvaluator(background, 'safety');
  const validator: IExternalValidator = config.validation.enabled
    ? new ExternalValidator(
        respond,
        new FallbackEvaluator(safetyJudge, keywordEvaluator, logger),
        config.validation,
        logger
      )
    : new DisabledExternalValidator();
  const ethicalInsight = new EthicalInsight(ethics, background, memory, logger);

  const scheduler = new PeriodicScheduler(
    createJobs(
      {
        persona,
        personaStore,
        explorer,
        buffer,
        initiator,
        reflection,
        improvement,
        evaluation,
        monitor,
        validator,
        ledger,
        gate,
        ethicalInsight,
        interactionCount: () => pipeline.getCompletedCount(),
        logger,
      },
      config.schedule
    ),
    logger
  );

  const transport =
    options.transport ?? new ConsoleTransport(logger, { replyPrefix: `${persona.name}: ` });

  const orchestrator = new Orchestrator(
    {
      transport,
      pipeline,
      scheduler,
      correction,
      persona,
      personaStore,
      flushables: [memory, storage],
      status,
      logger,
    },
    config.orchestrator
  );

  const start = async (): Promise<void> => {
    storage.startAutoFlush();
    await orchestrator.start();
  };

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    shutdownPromise ??= (async () => {
      logger.info('Shutting down...');
      await orchestrator.shutdown();
      await storage.shutdown();
      logger.info('Shutdown complete');
    })();
    return shutdownPromise;
  };

  return {
    logger,
    config,
    storage,
    transport,
    memory,
    personaStore,
    persona,
    gate,
    correction,
    ethics,
    pipeline,
    scheduler,
    ledger,
    status,
    orchestrator,
    start,
    shutdown,
  };
}
