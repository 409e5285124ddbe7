import { describeError, type Logger } from "./logger";

export type ClosableServer = {
  close: (callback: () => void) => unknown;
};

export type Stoppable = {
  name: string;
  stop: () => Promise<void>;
};

/**
 * Builds the signal handler: stops background loops (awaiting their in-flight work),
 * then the bot, then closes the HTTP server and finally `onClosed`.
 */
export function createGracefulShutdown(options: {
  bot?: { stop: (signal: string) => void } | null;
  httpServer: ClosableServer;
  stoppables?: Stoppable[];
  onClosed?: () => Promise<void>;
  logger?: Logger;
}) {
  const { bot, httpServer } = options;
  const logger = options.logger ?? console;
  let shuttingDown: Promise<void> | null = null;

  const shutdown = async (signal: string) => {
    logger.log(`${signal} received, stopping background work...`);
    for (const stoppable of options.stoppables ?? []) {
      try {
        await stoppable.stop();
        logger.log(`[shutdown] ${stoppable.name} stopped`);
      } catch (error) {
        logger.error(`[shutdown] ${stoppable.name} failed to stop: ${describeError(error)}`);
      }
    }
    if (bot) {
      try {
        bot.stop(signal);
      } catch (error) {
        // Throws when the bot never started polling, e.g. in webhook mode.
        logger.warn(`[shutdown] bot stop skipped: ${describeError(error)}`);
      }
    }
    await new Promise<void>((resolve) => {
      httpServer.close(() => {
        logger.log(`[shutdown] server closed (${signal})`);
        resolve();
      });
    });
    if (options.onClosed) {
      await options.onClosed();
    }
  };

  return (signal: string) => {
    if (!shuttingDown) {
      shuttingDown = shutdown(signal);
    }
    return shuttingDown;
  };
}
