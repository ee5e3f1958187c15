import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { Settings } from '../../config/settings';
import { EngineConfig } from '../../models/EngineConfig';
import { checkReadiness } from '../../services/ChainValidator';
import { DataManager } from '../../services/DataManager';
import { AutomationAlreadyRunningError, describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { WorkerPoolCoordinator } from '../../workers/WorkerPoolCoordinator';

export interface AutomationRoutesOptions {
  coordinator: WorkerPoolCoordinator;
  dataManager: DataManager;
  settings: Settings;
  config: EngineConfig;
}

export async function automationRoutes(
  fastify: FastifyInstance,
  options: AutomationRoutesOptions
): Promise<void> {
  const { coordinator, dataManager, settings, config } = options;

  const startSchema = z.object({
    workers: z.number().int().min(1).max(config.safetyLimits.maxParallelWorkers).default(1),
  });

  const runState = () => ({
    running: coordinator.isRunning(),
    paused: coordinator.isPaused(),
  });

  fastify.get('/api/automation/status', async (_request, reply) => {
    return reply.send({
      ...runState(),
      statistics: coordinator.getStatistics(),
      workers: coordinator.getWorkerStatuses(),
    });
  });

  // Starts a run in the background; progress is read through /status
  fastify.post('/api/automation/start', async (request, reply) => {
    const body = startSchema.parse(request.body ?? {});

    if (coordinator.isRunning()) {
      throw new AutomationAlreadyRunningError();
    }

    const runConfig = dataManager.getRunConfig(body.workers);
    const readiness = checkReadiness({
      accounts: runConfig.accounts,
      targets: runConfig.targets,
      chain: runConfig.actionChain,
      texts: runConfig.texts,
      browserType: settings.BROWSER_TYPE,
      dolphinApiUrl: settings.DOLPHIN_API_URL,
      dolphinToken: settings.DOLPHIN_TOKEN,
    });
    if (!readiness.ready) {
      return reply.code(400).send({ error: 'Automation is not ready to start', issues: readiness.issues });
    }

    coordinator
      .start(runConfig)
      .then((summary) => {
        logger.info(`Run finished at ${summary.finishedAt}${summary.stopped ? ' (stopped)' : ''}`);
      })
      .catch((error: unknown) => {
        logger.error(`Run failed: ${describeError(error)}`);
      });

    return reply.code(202).send({ ...runState(), workers: body.workers });
  });

  const notRunning = { error: 'Automation is not running', statusCode: 409 };

  fastify.post('/api/automation/stop', async (_request, reply) => {
    if (!coordinator.isRunning()) {
      return reply.code(409).send(notRunning);
    }
    coordinator.stop();
    return reply.send(runState());
  });

  fastify.post('/api/automation/pause', async (_request, reply) => {
    if (!coordinator.isRunning()) {
      return reply.code(409).send(notRunning);
    }
    coordinator.pause();
    return reply.send(runState());
  });

  fastify.post('/api/automation/resume', async (_request, reply) => {
    if (!coordinator.isRunning()) {
      return reply.code(409).send(notRunning);
    }
    coordinator.resume();
    return reply.send(runState());
  });
}
