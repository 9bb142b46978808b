/**
 * Popcast — Run Script
 *
 * Starts the scheduler: a cycle now, then one every CHECK_INTERVAL_MINUTES.
 *
 * Usage:
 *   npm start                            # Run until SIGINT/SIGTERM
 *   npm start -- --dry-run               # Preview without posting or recording
 *   npm start -- --once                  # Single cycle, then exit
 *   npm start -- --log-level debug       # Override LOG_LEVEL
 *
 * Exit codes: 0 after a clean shutdown, 1 when the configuration is invalid
 * or the ledger cannot be opened.
 */

import 'dotenv/config';
import { loadConfig, describeConfig, type PopcastConfig } from '../src/config';
import { createLedger } from '../src/ledger';
import { Scheduler, createCycleDeps, runCycle } from '../src/pipeline';
import { logger, errorMessage, isLogLevel, setLogLevel, type LogLevel } from '../src/lib/logger';

// ============================================================
// ARGUMENTS
// ============================================================

interface RunOptions {
  dryRun: boolean;
  once: boolean;
  logLevel?: LogLevel;
}

function parseArgs(args: string[]): RunOptions {
  const levelIndex = args.indexOf('--log-level');
  const level = levelIndex >= 0 ? args[levelIndex + 1] : undefined;

  return {
    dryRun: args.includes('--dry-run'),
    once: args.includes('--once'),
    logLevel: level !== undefined && isLogLevel(level) ? level : undefined,
  };
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  if (options.logLevel) setLogLevel(options.logLevel);

  let config: PopcastConfig;
  try {
    config = loadConfig(process.env, { dryRun: options.dryRun ? true : undefined });
  } catch (error) {
    logger.error('Startup failed', { error: errorMessage(error) });
    return 1;
  }

  logger.info('Popcast starting', describeConfig(config));

  const ledger = createLedger(config.ledger);
  try {
    await ledger.open();
  } catch (error) {
    logger.error('Ledger unavailable at startup', { error: errorMessage(error) });
    return 1;
  }

  const deps = createCycleDeps(config, ledger);
  const scheduler = new Scheduler(control => runCycle(deps, config, control), {
    intervalMs: config.checkIntervalMinutes * 60_000,
  });

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('Signal received', { signal });
    scheduler.requestShutdown();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    if (options.once) {
      await scheduler.runOnce();
    } else {
      await scheduler.start();
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await ledger.close();
  }

  logger.info('Popcast stopped');
  return 0;
}

main().then(
  code => {
    process.exitCode = code;
  },
  error => {
    logger.error('Fatal error', { error: errorMessage(error) });
    process.exitCode = 1;
  }
);
