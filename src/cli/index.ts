#!/usr/bin/env node
// Load environment variables BEFORE any other imports
import 'dotenv/config';

import pino from 'pino';
import { runCli } from './commands';
import { createAppContext } from '../app/context';
import { validateEnvironment } from '../config/env-config';
import { errorMessage } from '../domain/errors';
import { useLogDestination } from '../utils/logger';

async function main(): Promise<number> {
    // stdout fica só com a saída dos comandos
    useLogDestination(pino.destination(2), process.env.LOG_LEVEL ?? 'warn');

    validateEnvironment();
    const ctx = createAppContext();

    try {
        return await runCli(process.argv.slice(2), {
            out: line => process.stdout.write(`${line}\n`),
            err: line => process.stderr.write(`${line}\n`)
        }, ctx);
    } finally {
        await ctx.close();
    }
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        process.stderr.write(`Error: ${errorMessage(error)}\n`);
        process.exitCode = 1;
    });
