#!/usr/bin/env node
/**
 * Weather CLI
 * Entry point
 */

import { hideBin } from 'yargs/helpers';
import { run } from './cli/runner.js';
import { logger } from './logger.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
        reason: reason instanceof Error ? reason.message : String(reason),
    });
    process.exitCode = 1;
});

async function main(): Promise<void> {
    process.exitCode = await run(hideBin(process.argv));
}

main().catch((error: unknown) => {
    logger.error('Fatal error', {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
});
