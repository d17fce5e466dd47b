import { describe, it, mock, afterEach } from 'node:test';
import assert from 'node:assert';
import {
    LOG_LEVEL_ENV,
    Logger,
    createLogger,
    defaultLogLevel,
} from '../../lib/logger';

describe('defaultLogLevel', () => {
    it('should default to warn', () => {
        assert.strictEqual(defaultLogLevel({}), 'warn');
    });

    it('should read the environment', () => {
        assert.strictEqual(defaultLogLevel({ [LOG_LEVEL_ENV]: 'debug' }), 'debug');
        assert.strictEqual(defaultLogLevel({ [LOG_LEVEL_ENV]: ' ERROR ' }), 'error');
        assert.strictEqual(defaultLogLevel({ [LOG_LEVEL_ENV]: 'silent' }), 'silent');
    });

    it('should ignore unknown levels', () => {
        assert.strictEqual(defaultLogLevel({ [LOG_LEVEL_ENV]: 'verbose' }), 'warn');
    });
});

describe('Logger', () => {
    afterEach(() => {
        mock.restoreAll();
    });

    it('should filter by level', () => {
        const logger = new Logger('reader', 'warn');
        assert.strictEqual(logger.isEnabled('debug'), false);
        assert.strictEqual(logger.isEnabled('info'), false);
        assert.strictEqual(logger.isEnabled('warn'), true);
        assert.strictEqual(logger.isEnabled('error'), true);
    });

    it('should disable everything when silent', () => {
        const logger = new Logger('reader', 'silent');
        assert.strictEqual(logger.isEnabled('error'), false);
        assert.strictEqual(logger.isEnabled('silent'), false);
    });

    it('should change level at runtime', () => {
        const logger = createLogger('reader', 'error');
        logger.setLevel('debug');
        assert.strictEqual(logger.level, 'debug');
        assert.strictEqual(logger.isEnabled('debug'), true);
    });

    it('should format component, context and message', () => {
        const logger = new Logger('reader', 'debug', { reader: 'R1' });
        const line = logger.format('info', 'Channel opened', { cycle: 2 });
        assert.match(
            line,
            /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO component="reader" reader="R1" cycle=2 - Channel opened$/
        );
    });

    it('should merge context in child loggers', () => {
        const parent = new Logger('pcsc', 'debug', { a: 1 });
        const child = parent.child({ b: 'x' });
        assert.strictEqual(child.component, 'pcsc');
        assert.strictEqual(child.level, 'debug');
        assert.match(child.format('debug', 'm'), / component="pcsc" a=1 b="x" - m$/);
    });

    it('should write warnings to console.warn', () => {
        const warn = mock.method(console, 'warn', () => {});
        new Logger('reader', 'warn').warn('Close failed', { reason: 'unregister' });
        assert.strictEqual(warn.mock.callCount(), 1);
        assert.match(
            String(warn.mock.calls[0].arguments[0]),
            / WARN component="reader" reason="unregister" - Close failed$/
        );
    });

    it('should not write below the level', () => {
        const debug = mock.method(console, 'debug', () => {});
        new Logger('reader', 'info').debug('hidden');
        assert.strictEqual(debug.mock.callCount(), 0);
    });

    it('should add the error message to error logs', () => {
        const error = mock.method(console, 'error', () => {});
        new Logger('reader', 'error').error('Callback failed', 'boom');
        assert.match(
            String(error.mock.calls[0].arguments[0]),
            / ERROR component="reader" error="boom" - Callback failed$/
        );
    });
});
