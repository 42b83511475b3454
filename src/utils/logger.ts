// src/utils/logger.ts

import winston from 'winston';

export function createLogger(service: string, level: string = process.env.LOG_LEVEL ?? 'info'): winston.Logger {
    return winston.createLogger({
        level,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        defaultMeta: { service },
        transports: [new winston.transports.Console()],
    });
}

// Used by tests and anywhere output has to stay quiet.
export function createSilentLogger(): winston.Logger {
    return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}
