/**
 * Environment-driven configuration.
 *
 * RULES_LOG_LEVEL (or LOG_LEVEL)   winston level, default "info"
 * RULES_LOG_SILENT                 "1"/"true"/"on"/"yes" silences the default logger
 * RULES_DEPRECATION_WARNINGS       "0"/"false"/"off"/"no" disables deprecated-operator warnings
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface EngineConfig {
    logLevel: LogLevel;
    silent: boolean;
    warnOnDeprecated: boolean;
}

const LOG_LEVELS: ReadonlySet<string> = new Set(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
const ENABLED = new Set(['1', 'true', 'on', 'yes']);
const DISABLED = new Set(['0', 'false', 'off', 'no']);

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.has(value);
}

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) {
        return fallback;
    }
    const normalized = value.trim().toLowerCase();
    if (ENABLED.has(normalized)) return true;
    if (DISABLED.has(normalized)) return false;
    return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const level = (env.RULES_LOG_LEVEL ?? env.LOG_LEVEL ?? 'info').trim().toLowerCase();
    return {
        logLevel: isLogLevel(level) ? level : 'info',
        silent: flag(env.RULES_LOG_SILENT, false),
        warnOnDeprecated: flag(env.RULES_DEPRECATION_WARNINGS, true),
    };
}
