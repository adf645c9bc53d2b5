import { assert } from 'chai';
import { createLogger, LogLevel, LogSink, silentLogger } from '../util/logger';

function createSink() {
    const lines: string[] = [];
    const sink: LogSink = {
        error: (message) => void lines.push(`E ${message}`),
        warn: (message) => void lines.push(`W ${message}`),
        info: (message) => void lines.push(`I ${message}`),
        debug: (message) => void lines.push(`D ${message}`),
    };
    return {lines, sink};
}

describe('createLogger', () => {
    it('drops messages below the configured level', () => {
        const {lines, sink} = createSink();
        const logger = createLogger({name: 'test', level: LogLevel.Warn, sink});
        logger.debug('details');
        logger.info('progress');
        logger.warn('careful');
        logger.error('failed');
        assert.deepStrictEqual(lines, ['W [test] warn: careful', 'E [test] error: failed']);
    });

    it('appends the payload as JSON', () => {
        const {lines, sink} = createSink();
        const logger = createLogger({sink});
        logger.info('parsed', {file: 'a.py', statements: 2});
        logger.debug('hidden');
        assert.strictEqual(logger.level, LogLevel.Info);
        assert.deepStrictEqual(lines, ['I [pyscope] info: parsed {"file":"a.py","statements":2}']);
    });

    it('logs debug messages at the debug level', () => {
        const {lines, sink} = createSink();
        createLogger({level: LogLevel.Debug, sink}).debug('visible');
        assert.deepStrictEqual(lines, ['D [pyscope] debug: visible']);
    });

    it('provides a silent logger', () => {
        assert.strictEqual(silentLogger.level, LogLevel.Silent);
    });
});
