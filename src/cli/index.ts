#!/usr/bin/env node

import chalk from 'chalk';
import { TopTracksCLI } from './TopTracksCLI.js';

TopTracksCLI.run(process.argv.slice(2))
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
        console.error(chalk.red('Error fatal:'), error);
        process.exit(1);
    });
