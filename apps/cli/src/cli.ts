import {
  ArchiveError,
  createConsoleLogger,
  errorMessage,
  loadConfig,
  type Logger,
} from '@mailshelf/archive-core';
import { USAGE, configOverrides, numberFlag, parseArgs, stringFlag, type ParsedArgs } from './args';
import { buildArchive } from './build';
import { formatReport } from './report';
import { DEFAULT_PORT, startServer } from './serve';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** Conventional status for a run stopped by SIGINT */
export const EXIT_CANCELLED = 130;

export interface CliIO {
  print(line: string): void;
  /** Replaces the console logger built from config */
  logger?: Logger;
}

const consoleIO: CliIO = { print: (line) => console.log(line) };

async function runBuild(args: ParsedArgs, io: CliIO): Promise<number> {
  const [mboxPath, outDir] = args.rest;
  if (!mboxPath || !outDir || args.rest.length > 2) {
    USAGE.forEach((line) => io.print(line));
    return EXIT_FAILURE;
  }

  const config = loadConfig(configOverrides(args.flags), stringFlag(args.flags, 'config'));
  const logger = io.logger ?? createConsoleLogger({ level: config.logLevel, tag: 'mailshelf' });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupt received, finishing current email...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const { manifest, indexPath } = await buildArchive({
      mboxPath,
      outDir,
      config,
      logger,
      signal: controller.signal,
    });
    formatReport(manifest, indexPath).forEach((line) => io.print(line));
    return manifest.totals.cancelled ? EXIT_CANCELLED : EXIT_OK;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function runServe(args: ParsedArgs, io: CliIO): Promise<number> {
  const [archiveDir] = args.rest;
  if (!archiveDir || args.rest.length > 1) {
    USAGE.forEach((line) => io.print(line));
    return EXIT_FAILURE;
  }

  const port = numberFlag(args.flags, 'port') ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ArchiveError(`Invalid port: ${stringFlag(args.flags, 'port')}`);
  }

  const logger = io.logger ?? createConsoleLogger({ tag: 'mailshelf' });
  const server = await startServer(archiveDir, port, logger);
  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  io.print(`Serving ${archiveDir} at http://localhost:${boundPort}`);
  return EXIT_OK;
}

/** Run one CLI invocation and return its exit status. */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const args = parseArgs(argv);

  if (args.flags['help'] === true || !args.command) {
    USAGE.forEach((line) => io.print(line));
    return args.command ? EXIT_OK : EXIT_FAILURE;
  }

  try {
    switch (args.command) {
      case 'build':
        return await runBuild(args, io);
      case 'serve':
        return await runServe(args, io);
      default:
        io.print(`Unknown command: ${args.command}`);
        USAGE.forEach((line) => io.print(line));
        return EXIT_FAILURE;
    }
  } catch (err) {
    const logger = io.logger ?? createConsoleLogger({ tag: 'mailshelf' });
    if (err instanceof ArchiveError) {
      logger.error(err.message);
    } else {
      logger.error('Unexpected error', { error: errorMessage(err) });
    }
    return EXIT_FAILURE;
  }
}
