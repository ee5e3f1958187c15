import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { Settings } from '../config/settings';
import { EngineConfig } from '../models/EngineConfig';
import { DataManager } from '../services/DataManager';
import { logger } from '../utils/logger';
import { WorkerPoolCoordinator } from '../workers/WorkerPoolCoordinator';
import { errorHandler } from './middleware/error-handler';
import { automationRoutes } from './routes/automation';
import { dataRoutes } from './routes/data';

export interface ServerDependencies {
  dataManager: DataManager;
  coordinator: WorkerPoolCoordinator;
  settings: Settings;
  config: EngineConfig;
}

/**
 * Builds the control API without binding a port
 */
export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug(`${request.method} ${request.url} ${reply.statusCode}`, {
      reqId: request.id,
      responseTime: Math.round(reply.elapsedTime),
    });
  });

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/api/health', async (_request, reply) => {
    return reply.send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      automation: deps.coordinator.isRunning() ? 'running' : 'idle',
    });
  });

  await fastify.register(dataRoutes, { dataManager: deps.dataManager });
  await fastify.register(automationRoutes, deps);

  return fastify;
}

export async function startServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const fastify = await buildServer(deps);
  const { PORT: port, HOST: host } = deps.settings;

  await fastify.listen({ port, host });
  logger.info(`Control API listening on http://${host}:${port}`);

  return fastify;
}
