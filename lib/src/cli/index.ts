/**
 * CLI Module
 */

export { USAGE, parseArgs, type ParsedArgs } from './args.js';

export { ExitCode, runCli, type CliIo } from './run.js';
