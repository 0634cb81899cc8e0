import { DestinationStream, Logger, pino } from "pino";

let instance: Logger | null = null;

// Logger único da aplicação; o nível vem de LOG_LEVEL (padrão: info)
export function logger(): Logger {
    if (!instance) {
        instance = pino({ level: process.env.LOG_LEVEL || 'info' });
    }
    return instance;
}

/**
 * Replaces the application logger with one writing to `destination`
 * (the CLI sends logs to stderr so stdout carries only command output).
 */
export function useLogDestination(destination: DestinationStream, level: string = process.env.LOG_LEVEL || 'info'): Logger {
    instance = pino({ level }, destination);
    return instance;
}
