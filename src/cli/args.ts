// src/cli/args.ts

import { InvalidInputError } from '../domain/errors';

export type FlagValue = string | true;

export interface ParsedArgs {
    command: string | undefined;
    positionals: string[];
    flags: Record<string, FlagValue>;
}

// Flags que nunca consomem o próximo argumento
const BOOLEAN_FLAGS = new Set(['save', 'help']);

/**
 * `--flag value`, `--flag=value` e flags booleanas. Valores começando com um
 * único `-` (números negativos) são aceitos como valor.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const flags: Record<string, FlagValue> = {};

    for (let i = 0; i < argv.length; i++) {
        const token = argv[i];

        if (!token.startsWith('--')) {
            positionals.push(token);
            continue;
        }

        const body = token.slice(2);
        const eq = body.indexOf('=');
        if (eq >= 0) {
            flags[body.slice(0, eq)] = body.slice(eq + 1);
            continue;
        }

        const next = argv[i + 1];
        if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--')) {
            flags[body] = next;
            i++;
        } else {
            flags[body] = true;
        }
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, flags };
}

export function stringFlag(flags: Record<string, FlagValue>, name: string): string | undefined {
    const value = flags[name];
    if (value === true) {
        throw new InvalidInputError(`option --${name} requires a value`, name);
    }
    return value;
}

export function requiredFlag(flags: Record<string, FlagValue>, name: string): string {
    const value = stringFlag(flags, name);
    if (value === undefined) {
        throw new InvalidInputError(`missing required option --${name}`, name);
    }
    return value;
}

export function booleanFlag(flags: Record<string, FlagValue>, name: string): boolean {
    const value = flags[name];
    return value === true || value === 'true';
}
