#!/usr/bin/env node
/**
 * cli.ts — `causelist-courier [--once]`
 *
 * Reads `.env`, builds the courier and either runs a single cycle or keeps
 * ticking until SIGINT/SIGTERM.  Only configuration errors exit non-zero.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { ConfigError, loadCourierConfig } from './core/config';
import { Logger } from './core/logger';
import { buildCourier, type Courier } from './courier';
import { describeOutcome } from './scheduler';

const logger = new Logger('CLI');

const program = new Command();
program
  .name('causelist-courier')
  .description('Send the next cause list to a WhatsApp audience as soon as it is published')
  .version('1.0.0')
  .option('--once', 'run a single cycle now, ignoring the send window and the daily marker')
  .action(async (opts: { once?: boolean }) => {
    let courier: Courier;
    try {
      courier = buildCourier(loadCourierConfig());
    } catch (err) {
      if (err instanceof ConfigError) {
        logger.error(`Configuration error: ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    const { scheduler, shutdown } = courier;

    if (opts.once) {
      const outcome = await scheduler.runOnce();
      logger.info(`Single run finished: ${describeOutcome(outcome)}`);
      await shutdown();
      return;
    }

    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info(`Received ${signal}, shutting down…`);
      scheduler.stop();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    await scheduler.start();
    await shutdown();
    // The interrupted tick sleep may still hold a timer.
    process.exit(0);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error('Courier stopped unexpectedly', err);
  process.exit(1);
});
