import * as p from '@clack/prompts';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse } from './cli-response.js';
import { ExitCodes, exitCodeToErrorCode, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

/**
 * Output format requested on the raw command line, before validation
 */
export function outputFormatFor(rawOptions: Record<string, unknown>): OutputFormat {
  return rawOptions['json'] === true ? 'json' : 'text';
}

/**
 * Formats and writes CLI output: human-readable text, or a single JSON
 * envelope on stdout. Logs never go to stdout.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {}

  /**
   * Print the success envelope (JSON mode only).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    process.exit(this.report(command, error, exitCode));
  }

  /**
   * Output an error response without exiting; returns the exit code so a
   * command can finish its cleanup first.
   */
  report(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): ExitCode {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, so callers can parse the envelope
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      p.log.error(`${pc.red(pc.bold(errorCode))} ${error.message}`);
    }

    return exitCode;
  }

  /**
   * Spinner for long network calls (text mode only).
   */
  spinner(): ReturnType<typeof p.spinner> | undefined {
    if (this.format === 'json') {
      return undefined;
    }
    return p.spinner();
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  /**
   * Plain text block, printed as-is.
   */
  text(message: string): void {
    if (this.format === 'text') {
      console.log(message);
    }
  }
}
