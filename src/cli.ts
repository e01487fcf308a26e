#!/usr/bin/env node
import { config } from './config/index.js';
import { loadHeaderConfig } from './config/headers.js';
import { loadSites } from './config/sites.js';
import { USAGE, parseCliArgs } from './cli/args.js';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, EXIT_USAGE, runExitCode } from './cli/exit-codes.js';
import { promptUsernames, readUserList } from './cli/usernames.js';
import { createLogger } from './services/logger/logger.js';
import { ConsolePrinter, HOWTO } from './services/output/console.js';
import { scout } from './services/scout/scout-run.js';
import { AppError, ValidationError, getErrorMessage, toErrorObject } from './utils/errors.js';

const logger = createLogger('cli');

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: toErrorObject(reason) }, 'Unhandled rejection');
  process.exit(EXIT_FAILURE);
});

process.on('uncaughtException', (error) => {
  logger.fatal({ err: toErrorObject(error) }, 'Uncaught exception');
  process.exit(EXIT_FAILURE);
});

/**
 * First Ctrl-C stops dispatching and lets in-flight probes finish so the
 * links file closes cleanly; a second one exits at once.
 */
function installInterruptHandler(controller: AbortController): () => void {
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    process.stderr.write('\nInterrupted: finishing in-flight requests (Ctrl-C again to quit now)\n');
    controller.abort();
  };
  process.on('SIGINT', onSigint);
  return () => process.off('SIGINT', onSigint);
}

async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv, config);
  const printer = new ConsolePrinter(process.stdout, args.color);

  if (args.help) {
    printer.line(USAGE);
    return EXIT_OK;
  }

  if (args.howto && !args.count) {
    printer.line(HOWTO);
  }

  const sites = await loadSites(args.sitesFile);
  if (args.count) {
    printer.line(String(sites.length));
    return EXIT_OK;
  }
  const headerConfig = await loadHeaderConfig(args.headersFile);

  const usernames = [...args.usernames];
  if (args.userlist) {
    usernames.push(...(await readUserList(args.userlist)));
  }

  if (usernames.length === 0) {
    printer.line('No usernames supplied on CLI or via --userlist.');
    const entered = await promptUsernames();
    if (entered === null) {
      printer.line('\nAborted.');
      return EXIT_FAILURE;
    }
    if (entered.length === 0) {
      printer.line('No usernames entered. Exiting.');
      return EXIT_FAILURE;
    }
    usernames.push(...entered);
  }

  const controller = new AbortController();
  const removeInterruptHandler = installInterruptHandler(controller);
  try {
    const report = await scout({
      usernames,
      sites,
      headerConfig,
      mode: args.mode,
      threads: args.threads,
      timeoutSeconds: args.timeoutSeconds,
      proxy: args.proxy,
      only: args.only,
      linksOut: args.linksOut,
      hitsJsonl: args.hitsOut,
      csvOut: args.csvOut,
      color: args.color,
      domainLimit: config.DOMAIN_LIMIT,
      jitter: { minMs: config.JITTER_MIN_MS, maxMs: config.JITTER_MAX_MS },
      maxRetries: config.HTTP_MAX_RETRIES,
      backoffMs: config.HTTP_BACKOFF_MS,
      signal: controller.signal,
    });
    return runExitCode(report.summary, controller.signal);
  } finally {
    removeInterruptHandler();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ValidationError) {
      process.stderr.write(`Error: ${error.message}\n\n${USAGE}\n`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    if (error instanceof AppError) {
      logger.error({ err: toErrorObject(error) }, 'Startup failed');
      process.stderr.write(`Error, ${getErrorMessage(error)}\n`);
      process.exitCode = EXIT_FAILURE;
      return;
    }
    logger.fatal({ err: toErrorObject(error) }, 'Run failed');
    process.stderr.write(`Fatal: ${getErrorMessage(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
