#!/usr/bin/env node
import { createProgram } from './cli';
import { AurstepError, UserCancelledError } from './errors';
import logger from './logger';

const start = async () => {
    try {
        await createProgram().parseAsync(process.argv);
    } catch (err) {
        if (err instanceof UserCancelledError) {
            logger.info('Aborted.');
        } else if (err instanceof AurstepError) {
            logger.error(err.message);
        } else {
            logger.error(`Unexpected error. Reason: ${err}`);
            if (err instanceof Error && err.stack) {
                logger.debug(err.stack);
            }
        }
        process.exitCode = 1;
    }
};

void start();
