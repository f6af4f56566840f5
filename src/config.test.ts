import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadConfig, createLogger, evaluate } from './index.js';
import type { LogSink } from './index.js';

describe('loadConfig', () => {
    it('uses defaults for an empty environment', () => {
        assert.deepStrictEqual(loadConfig({}), { logLevel: 'info', silent: false, warnOnDeprecated: true });
    });

    it('reads the log level, preferring RULES_LOG_LEVEL', () => {
        assert.strictEqual(loadConfig({ LOG_LEVEL: 'DEBUG' }).logLevel, 'debug');
        assert.strictEqual(loadConfig({ LOG_LEVEL: 'debug', RULES_LOG_LEVEL: ' warn ' }).logLevel, 'warn');
        assert.strictEqual(loadConfig({ RULES_LOG_LEVEL: 'loud' }).logLevel, 'info');
    });

    it('parses boolean flags', () => {
        assert.strictEqual(loadConfig({ RULES_LOG_SILENT: 'yes' }).silent, true);
        assert.strictEqual(loadConfig({ RULES_LOG_SILENT: 'maybe' }).silent, false);
        assert.strictEqual(loadConfig({ RULES_DEPRECATION_WARNINGS: 'off' }).warnOnDeprecated, false);
        assert.strictEqual(loadConfig({ RULES_DEPRECATION_WARNINGS: 'TRUE' }).warnOnDeprecated, true);
    });
});

describe('createLogger', () => {
    it('applies level and silence', () => {
        const logger = createLogger({ logLevel: 'warn', silent: true, warnOnDeprecated: true });
        assert.strictEqual(logger.level, 'warn');
        assert.strictEqual(logger.silent, true);
    });
});

describe('evaluate configuration', () => {
    it('reads the environment once at load time', () => {
        const warnings: string[] = [];
        const sink: LogSink = {
            info: () => undefined,
            warn: (message) => warnings.push(message),
            debug: () => undefined,
        };
        const previous = process.env.RULES_DEPRECATION_WARNINGS;
        process.env.RULES_DEPRECATION_WARNINGS = '0';
        try {
            assert.strictEqual(evaluate({ count: [1, 1] }, {}, { logger: sink }), 2);
            assert.strictEqual(warnings.length, 1);
            assert.strictEqual(evaluate({ count: [1] }, {}, { logger: sink, warnOnDeprecated: false }), 1);
            assert.strictEqual(warnings.length, 1);
        } finally {
            if (previous === undefined) {
                delete process.env.RULES_DEPRECATION_WARNINGS;
            } else {
                process.env.RULES_DEPRECATION_WARNINGS = previous;
            }
        }
    });
});
