// src/__tests__/utils/logger.test.ts

import { describe, it, expect } from 'vitest';
import { logger, useLogDestination } from '../../utils/logger';

describe('logger', () => {
    it('writes JSON lines to the chosen destination at the chosen level', () => {
        const lines: string[] = [];
        const log = useLogDestination({ write: (msg: string) => { lines.push(msg); } }, 'warn');

        log.info('[CLI] below the level');
        log.warn('[CLI] kept');

        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0])).toMatchObject({ level: 40, msg: '[CLI] kept' });
    });

    it('makes the replaced logger the application logger', () => {
        const log = useLogDestination({ write: () => undefined }, 'error');
        expect(logger()).toBe(log);
    });
});
