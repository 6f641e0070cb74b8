// Process-level error handlers and graceful shutdown
import type { Server } from 'http';
import { logger } from '@/services/logger';

type Cleanup = () => Promise<void>;

let serverInstance: Server | null = null;
const cleanups: Cleanup[] = [];
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Registered cleanups run in reverse order of registration during shutdown. */
export function onShutdown(cleanup: Cleanup): void {
  cleanups.push(cleanup);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.on(signal, () => {
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) logger.warn('process:server_close_failed', { error: err.message });
      resolve();
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown');
    process.exit(1);
  }, 15_000);
  forced.unref();

  let code = exitCode;
  try {
    if (serverInstance) await closeServer(serverInstance);
    for (const cleanup of [...cleanups].reverse()) {
      await cleanup();
    }
  } catch (error) {
    logger.error('process:shutdown_cleanup_failed', { error: error instanceof Error ? error.message : String(error) });
    code = 1;
  }
  clearTimeout(forced);
  process.exit(code);
}
