#!/usr/bin/env node
import { createControllers, runCommand } from './cli';
import { errorMessage } from './errors';
import { logger } from './services/LogService';

runCommand(process.argv[2], createControllers())
    .then(({ exitCode, output }) => {
        if (exitCode === 0) {
            console.log(output);
        } else {
            console.error(output);
        }
        process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
        logger.fatal({ error }, 'Command failed');
        console.error(errorMessage(error));
        process.exitCode = 1;
    });
