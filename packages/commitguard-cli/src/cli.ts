#!/usr/bin/env node
import { EXIT_ENGINE_ERROR } from '@commitguard/core';
import { createProgram } from './program.js';
import { printError } from './commands/output.js';

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        printError(error);
        process.exitCode = EXIT_ENGINE_ERROR;
    });
