/**
 * `ingest-pdf` command
 *
 * stdout carries exactly one JSON status line on success; usage text for
 * --help. Everything else, logs included, goes to stderr.
 *
 * Exit codes: 0 success, 1 ingestion failure, 2 usage or configuration error.
 */

import { ZodError } from 'zod';
import { type IngestConfig, type IngestEnv, loadIngestConfig, validateIngestEnv } from '../config/index.js';
import { Logger, LogLevel } from '../logging/index.js';
import { ingestPdf } from '../ingest/pipeline.js';
import type { IngestDependencies } from '../ingest/types.js';
import { isIngestError } from '../pdf/types.js';
import { USAGE, parseArgs } from './args.js';

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIo {
  /** Receives one line (without newline) for stdout */
  stdout: (line: string) => void;
  /** Receives one line (without newline) for stderr */
  stderr: (line: string) => void;
  env?: IngestEnv;
  dependencies?: IngestDependencies;
}

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

function createCliLogger(config: IngestConfig, flags: { verbose: boolean; quiet: boolean }, io: CliIo): Logger {
  let level = config.logLevel;
  if (flags.verbose) {
    level = LogLevel.DEBUG;
  } else if (flags.quiet) {
    level = LogLevel.ERROR;
  }

  return new Logger({
    level,
    format: config.logFormat,
    source: 'ingest',
    output: (line) => {
      io.stderr(line);
    },
  });
}

/**
 * Run the command and resolve with its exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCode> {
  const args = parseArgs(argv);

  if (args.kind === 'help') {
    io.stdout(USAGE);
    return ExitCode.SUCCESS;
  }

  if (args.kind === 'usage-error') {
    io.stderr(`ERROR: ${args.message}`);
    io.stderr(USAGE);
    return ExitCode.USAGE;
  }

  const env = io.env ?? process.env;

  let config: IngestConfig;
  try {
    config = loadIngestConfig(env, args.overrides);
  } catch (error) {
    if (error instanceof ZodError) {
      io.stderr(`ERROR: Invalid configuration: ${formatZodError(error)}`);
      return ExitCode.USAGE;
    }
    throw error;
  }

  const logger = createCliLogger(config, args, io);

  for (const warning of validateIngestEnv(env).warnings) {
    logger.warn('Configuration warning', { warning });
  }

  try {
    const summary = await ingestPdf(args.inputPath, args.outputDir, {
      config,
      logger,
      dependencies: io.dependencies,
    });
    io.stdout(JSON.stringify(summary));
    return ExitCode.SUCCESS;
  } catch (error) {
    if (isIngestError(error)) {
      logger.debug('Ingestion failed', { code: error.code, filePath: error.filePath });
    } else if (error instanceof Error) {
      logger.error('Unexpected failure', error);
    }

    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`ERROR: ${message}`);
    return ExitCode.FAILURE;
  }
}
