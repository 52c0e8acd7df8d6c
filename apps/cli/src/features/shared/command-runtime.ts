import { createExchangeRateService, type ExchangeRateService } from '@lkr-rates/exchange-rates';
import { getLogger, setLoggerTransports } from '@lkr-rates/logger';

const logger = getLogger('command-runtime');

/**
 * Owns the exchange rate service for one command run.
 *
 * - `service()`: lazy init; destroyed in dispose
 * - `dispose()`: remove SIGINT handler, destroy service. Idempotent.
 */
export class CommandContext {
  exitCode = 0;

  private servicePromise: Promise<ExchangeRateService> | undefined;
  private disposed = false;
  private sigintHandler: (() => void) | undefined;

  constructor() {
    this.sigintHandler = () => {
      this.dispose()
        .catch((error: unknown) => {
          logger.error({ error }, 'Error during abort dispose');
        })
        .finally(() => {
          process.exit(130);
        });
    };
    process.once('SIGINT', this.sigintHandler);
  }

  async service(): Promise<ExchangeRateService> {
    if (this.disposed) {
      throw new Error('Command context already disposed');
    }
    if (!this.servicePromise) {
      this.servicePromise = createExchangeRateService().then((result) => {
        if (result.isErr()) {
          throw result.error;
        }
        return result.value;
      });
    }
    return this.servicePromise;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    if (this.sigintHandler) {
      process.off('SIGINT', this.sigintHandler);
      this.sigintHandler = undefined;
    }

    if (this.servicePromise) {
      const service = await this.servicePromise.catch((error: unknown) => {
        logger.debug({ error }, 'Service never started; nothing to release');
        return undefined;
      });
      await service?.destroy();
    }
  }
}

/**
 * Run a CLI command with automatic resource cleanup.
 *
 * Errors from fn propagate to the command's own catch. Dispose always runs;
 * when both fail, the fn error wins and the dispose error is logged.
 */
export async function runCommand(fn: (ctx: CommandContext) => Promise<void>): Promise<void> {
  const ctx = new CommandContext();
  let fnError: unknown;

  try {
    await fn(ctx);
  } catch (error) {
    fnError = error;
  }

  try {
    await ctx.dispose();
  } catch (disposeError) {
    if (fnError) {
      logger.error({ error: disposeError }, 'Cleanup failed (original error takes priority)');
    } else {
      fnError = disposeError;
    }
  }

  if (fnError) {
    throw fnError instanceof Error ? fnError : new Error(String(fnError));
  }

  if (ctx.exitCode !== 0) {
    process.exit(ctx.exitCode);
  }
}

/**
 * --verbose turns console logging on (stderr)
 */
export function applyVerboseFlag(verbose: boolean | undefined): void {
  if (verbose) {
    setLoggerTransports({ console: true });
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
