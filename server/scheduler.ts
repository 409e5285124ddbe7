import { describeError, logJson, type Logger } from "./logger";

export type TickerOptions<T> = {
  name: string;
  intervalMs: number;
  task: () => Promise<T>;
  /** Run the first time right after start instead of one interval later. */
  runOnStart?: boolean;
  logger?: Logger;
};

/**
 * Runs `task` repeatedly, waiting `intervalMs` after each run settles, so runs never overlap.
 */
export function createTicker<T>(options: TickerOptions<T>) {
  const logger = options.logger ?? console;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<T> | null = null;
  let running = false;

  const runNow = (): Promise<T> => {
    if (!inFlight) {
      inFlight = options.task().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  };

  const schedule = (delayMs: number) => {
    if (!running) return;
    timer = setTimeout(() => void tick(), delayMs);
  };

  const tick = async () => {
    timer = null;
    try {
      await runNow();
    } catch (error) {
      logJson(
        "error",
        "ticker.task_failed",
        { ticker: options.name, error: describeError(error) },
        logger,
      );
    }
    schedule(options.intervalMs);
  };

  return {
    get name() {
      return options.name;
    },
    get isRunning() {
      return running;
    },
    runNow,
    start() {
      if (running) return;
      running = true;
      schedule(options.runOnStart ? 0 : options.intervalMs);
      logger.log(`[${options.name}] ticker started, every ${options.intervalMs}ms`);
    },
    /** Stops scheduling and resolves once the in-flight run has settled. */
    async stop() {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (inFlight) {
        await Promise.allSettled([inFlight]);
      }
    },
  };
}

export type Ticker<T> = ReturnType<typeof createTicker<T>>;
