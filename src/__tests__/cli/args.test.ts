// src/__tests__/cli/args.test.ts

import { describe, it, expect } from 'vitest';
import { booleanFlag, parseArgs, requiredFlag, stringFlag } from '../../cli/args';

describe('parseArgs', () => {
    it('splits command, positionals and flags', () => {
        expect(parseArgs(['models', 'add', 'CFD', '--description', 'flow solver'])).toEqual({
            command: 'models',
            positionals: ['add', 'CFD'],
            flags: { description: 'flow solver' }
        });
    });

    it('accepts --flag=value', () => {
        expect(parseArgs(['report', '--model-name=CFD', '--days=7']).flags).toEqual({ 'model-name': 'CFD', days: '7' });
    });

    it('keeps negative numbers as values', () => {
        expect(parseArgs(['calculate', '--downtime', '-5']).flags).toEqual({ downtime: '-5' });
    });

    it('never lets a boolean flag swallow the next token', () => {
        const args = parseArgs(['calculate', '--save', 'extra', '--notes', 'x']);

        expect(args.flags).toEqual({ save: true, notes: 'x' });
        expect(args.positionals).toEqual(['extra']);
    });

    it('marks a trailing valued flag as present without value', () => {
        expect(parseArgs(['list', '--days']).flags).toEqual({ days: true });
    });

    it('has no command for an empty argv', () => {
        expect(parseArgs([]).command).toBeUndefined();
    });
});

describe('flag readers', () => {
    const flags = parseArgs(['x', '--a', '1', '--b', '--save']).flags;

    it('reads string flags', () => {
        expect(stringFlag(flags, 'a')).toBe('1');
        expect(stringFlag(flags, 'missing')).toBeUndefined();
        expect(() => stringFlag(flags, 'b')).toThrow('option --b requires a value');
    });

    it('reads required flags', () => {
        expect(requiredFlag(flags, 'a')).toBe('1');
        expect(() => requiredFlag(flags, 'missing')).toThrow('missing required option --missing');
    });

    it('reads boolean flags', () => {
        expect(booleanFlag(flags, 'save')).toBe(true);
        expect(booleanFlag(flags, 'a')).toBe(false);
    });
});
