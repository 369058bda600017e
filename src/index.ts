#!/usr/bin/env node

import { createProgram } from './cli';
import { Logger } from './services/logger';

createProgram()
    .parseAsync()
    .catch((error: unknown) => {
        new Logger().critical('Fatal execution error', error);
        process.exit(1);
    });
