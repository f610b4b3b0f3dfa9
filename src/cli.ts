#!/usr/bin/env node
import { createCLI } from './cli-lib';

const cli = createCLI();
cli.parse(process.argv, { run: false });

Promise.resolve(cli.runMatchedCommand()).catch((error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
});
