import winston from 'winston';
import { loadConfig } from './config.js';
import type { EngineConfig } from './config.js';

const { combine, timestamp, printf } = winston.format;

const ruleFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;

    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
});

export function createLogger(config: EngineConfig = loadConfig()): winston.Logger {
    return winston.createLogger({
        level: config.logLevel,
        silent: config.silent,
        format: combine(timestamp(), ruleFormat),
        transports: [new winston.transports.Console()],
    });
}

/** Shared logger used by `log`, deprecation warnings and failed `method` calls. */
export const logger = createLogger();
