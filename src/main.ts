#!/usr/bin/env node
// src/main.ts

import 'reflect-metadata';
import config from './config';
import { registerDependencies } from './register';

// === REGISTER DEPENDENCIES IMMEDIATELY ===
registerDependencies();
// ==========================================

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { createProgram } from './cli/program';
import { CliContext, processIO, signalExitCode } from './cli/context';
import { AppError } from './core/common/errors';
import { errorMessage } from './core/common/utils';
import { AppDataSource } from './infrastructure/database/providers/data-source.provider';
import { LOGGER_TOKEN } from './infrastructure/logger';

async function shutdown(): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    try {
        await container.resolve(AppDataSource).close();
    } catch (error: unknown) {
        logger.error('Error during shutdown:', { message: errorMessage(error) });
    }
}

async function bootstrap(argv: string[]): Promise<number> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    logger.debug(`Starting in ${config.nodeEnv} mode (store: ${config.storeBackend}, log level: ${config.logLevel}).`);

    const context: CliContext = { container, io: processIO, exitCode: 0 };
    try {
        await createProgram(context).parseAsync(argv);
        return context.exitCode;
    } catch (error: unknown) {
        if (error instanceof AppError && error.isOperational) {
            process.stderr.write(`${error.name}: ${error.message}\n`);
        } else {
            logger.error('Command failed:', { message: errorMessage(error), stack: error instanceof Error ? error.stack : undefined });
        }
        return 1;
    } finally {
        await shutdown();
    }
}

// Listen for termination signals
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
        container.resolve<Logger>(LOGGER_TOKEN).warn(`Received ${signal}. Shutting down...`);
        shutdown().then(() => process.exit(signalExitCode(signal)), () => process.exit(1));
    });
}

bootstrap(process.argv).then(code => {
    process.exitCode = code;
}, (error: unknown) => {
    process.stderr.write(`Failed to start: ${errorMessage(error)}\n`);
    process.exitCode = 1;
});
