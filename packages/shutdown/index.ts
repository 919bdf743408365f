import { getLogger } from '@kernel/logger';
import { withTimeout } from '@utils/withTimeout';

/**
* Centralized Shutdown Manager Package
* Prevents multiple competing SIGTERM/SIGINT handlers
*
* Resources that need closing (the stdio transport, gRPC channels) register
* a handler here; the entry point wires the process signals once.
*/

const logger = getLogger({ service: 'shutdown' });

/** Shutdown handler function type */
export type ShutdownHandler = () => Promise<void> | void;

const handlers: Set<ShutdownHandler> = new Set();

let isShuttingDown = false;

/** Upper bound on a single handler */
const HANDLER_TIMEOUT_MS = 10000;

// ============================================================================
// Handler Management
// ============================================================================

/**
* Register a shutdown handler to be called during graceful shutdown
* @returns Function to unregister the handler
*/
export function registerShutdownHandler(handler: ShutdownHandler): () => void {
  handlers.add(handler);
  return () => {
  handlers.delete(handler);
  };
}

/**
* Unregister all shutdown handlers
*/
export function clearShutdownHandlers(): void {
  handlers.clear();
}

export function getHandlerCount(): number {
  return handlers.size;
}

// ============================================================================
// Shutdown Execution
// ============================================================================

/**
* Run every registered handler; one failing handler does not stop the others.
* @returns Number of handlers that failed
*/
export async function runShutdownHandlers(reason: string): Promise<number> {
  if (isShuttingDown) return 0;
  isShuttingDown = true;

  logger.info('Shutting down', { reason, handlers: handlers.size });

  const results = await Promise.allSettled(
  Array.from(handlers).map(async (handler, index) => {
    const handlerName = handler.name || `handler-${index}`;
    try {
    await withTimeout(Promise.resolve(handler()), HANDLER_TIMEOUT_MS, {
      message: `Shutdown handler ${handlerName} timed out`,
    });
    } catch (error) {
    logger.error(`Shutdown handler ${handlerName} failed`, error instanceof Error ? error : new Error(String(error)));
    throw error;
    }
  })
  );

  const failures = results.filter(r => r.status === 'rejected').length;
  if (failures > 0) {
  logger.error(`${failures} shutdown handlers failed`);
  }
  return failures;
}

/**
* Run handlers, then exit the process
*/
export async function gracefulShutdown(reason: string, exitCode = 0): Promise<void> {
  const failures = await runShutdownHandlers(reason);
  process.exit(failures > 0 && exitCode === 0 ? 1 : exitCode);
}

/**
* Reset the shutdown state
* Useful for testing
*/
export function resetShutdownState(): void {
  isShuttingDown = false;
}

export function getIsShuttingDown(): boolean {
  return isShuttingDown;
}

// ============================================================================
// Global Handler Setup
// ============================================================================

let isRegistered = false;

/**
* Setup global shutdown handlers: SIGTERM, SIGINT, and stdin closing
* (the client went away). Safe to call multiple times.
*/
export function setupShutdownHandlers(): void {
  if (isRegistered) return;
  isRegistered = true;

  const trigger = (reason: string) => () => {
  gracefulShutdown(reason).catch((error: unknown) => {
    logger.fatal('Shutdown failed', error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  });
  };

  process.on('SIGTERM', trigger('SIGTERM'));
  process.on('SIGINT', trigger('SIGINT'));
  process.stdin.on('close', trigger('stdin closed'));
}
