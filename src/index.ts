import { FastifyInstance } from 'fastify';
import { startServer } from './api/server';
import { createSessionProvider } from './browser/browserLauncher';
import { ISessionProvider } from './browser/types';
import { loadEngineConfig } from './config/engine';
import { getSettings } from './config/settings';
import { getDataManager } from './services/DataManager';
import { getSessionGate } from './services/SessionGate';
import { logger } from './utils/logger';
import { WorkerPoolCoordinator } from './workers/WorkerPoolCoordinator';

async function main(): Promise<void> {
  let server: FastifyInstance | null = null;
  let coordinator: WorkerPoolCoordinator | null = null;
  let sessionProvider: ISessionProvider | null = null;

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    try {
      if (coordinator?.isRunning()) {
        coordinator.stop();
        logger.info('Automation stopped');
      }

      if (server) {
        await server.close();
        logger.info('Server closed');
      }

      if (sessionProvider) {
        await sessionProvider.shutdown();
        logger.info('Browser sessions closed');
      }

      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection:', reason);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception:', error);
    void shutdown('uncaughtException');
  });

  try {
    const settings = getSettings();
    const config = loadEngineConfig(settings.ENGINE_CONFIG_FILE);

    const dataManager = getDataManager();
    await dataManager.load();

    sessionProvider = createSessionProvider(settings, config);
    coordinator = new WorkerPoolCoordinator({
      config,
      sessionProvider,
      sessionGate: getSessionGate(),
      accountStore: dataManager,
    });

    server = await startServer({ dataManager, coordinator, settings, config });
    logger.info('Application started successfully');
  } catch (error) {
    logger.error('Failed to start application:', error);
    await shutdown('startup-error');
  }
}

void main();
