/**
 * Composition root: wires registry, store, graph service and orchestrator
 */

import type { AppConfig } from './config';
import { createLogger, Logger } from './logger';
import { GraphStateStore } from './persistence/graph-state-store';
import { MemoryGraphStateStore } from './persistence/memory-store';
import { MongoGraphStateStore } from './persistence/mongo-store';
import { GraphService } from './services/graph-service';
import { SessionOrchestrator } from './services/session-orchestrator';
import type { ChatModel } from './types/chat-model.types';
import { WorkflowRegistry, registerWorkflows } from './workflows';

export type CreateAppOptions = {
  config: AppConfig;
  chatModel: ChatModel;
  /** Use this store instead of the one the config selects; the caller owns it */
  store?: GraphStateStore;
  logger?: Logger;
};

export type App = {
  config: AppConfig;
  logger: Logger;
  registry: WorkflowRegistry;
  store: GraphStateStore;
  graphService: GraphService;
  orchestrator: SessionOrchestrator;
  /** Disconnect the store if the app opened it */
  close(): Promise<void>;
};

export async function createApp(options: CreateAppOptions): Promise<App> {
  const { config, chatModel } = options;
  const logger = options.logger ?? createLogger(config.logLevel);

  const registry = registerWorkflows(new WorkflowRegistry({ logger }));

  let store: GraphStateStore;
  let ownsStore = false;
  if (options.store) {
    store = options.store;
  } else if (config.mongo) {
    const mongoStore = new MongoGraphStateStore({ ...config.mongo, logger });
    await mongoStore.connect();
    store = mongoStore;
    ownsStore = true;
  } else {
    store = new MemoryGraphStateStore();
    ownsStore = true;
  }

  const graphService = new GraphService(
    registry,
    { chatModel, logger, toolDispatch: config.graph.toolDispatch },
    { maxSteps: config.graph.maxSteps }
  );
  const orchestrator = new SessionOrchestrator({
    graphService,
    store,
    logger,
    strictSettings: config.session.strictSettings,
    defaultWorkflow: config.session.defaultWorkflow,
  });

  logger.info(
    `[${config.appName}] ready (${config.appEnv}): workflows ${registry
      .listNames()
      .join(', ')}; store ${store.constructor.name}`
  );

  return {
    config,
    logger,
    registry,
    store,
    graphService,
    orchestrator,
    async close() {
      if (ownsStore) {
        await store.close();
      }
    },
  };
}
