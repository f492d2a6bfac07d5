import { Server } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { logger } from './config/logger';
import { handleUncaughtException, handleUnhandledRejection } from './middleware/errorHandler';
import { AgentRuntime, createRuntime } from './runtime';

async function gracefulShutdown(signal: string, server: Server, runtime: AgentRuntime): Promise<void> {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close();
  try {
    // In-flight sessions are abandoned; only pending log and settings writes are awaited
    await Promise.all([runtime.audit.flush(), runtime.availability.flush()]);
    logger.info('Graceful shutdown completed', { abandonedSessions: runtime.sessions.size });
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

export async function startServer(): Promise<Server> {
  handleUncaughtException();
  handleUnhandledRejection();

  const runtime = createRuntime();
  await runtime.availability.hydrate();

  const app = createApp(runtime);
  const server = app.listen(env.PORT, env.HOST, () => {
    logger.info(`Agent dispatch service running on ${env.HOST}:${env.PORT} in ${env.NODE_ENV} mode`);
    logger.info(`Health check available at http://localhost:${env.PORT}/api/health`);
  });

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM', server, runtime));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT', server, runtime));

  return server;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}
