import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { Logger, formatDuration, isLogLevel } from './Logger';

describe('Logger', () => {
    let log: MockInstance<typeof console.log>;
    let warn: MockInstance<typeof console.warn>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
        log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('drops messages below the configured level', () => {
        const logger = new Logger('warn');

        logger.debug('hidden');
        logger.info('hidden too');
        logger.warn('shown');

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('shown');
    });

    it('prefixes child loggers with their scope', () => {
        const logger = new Logger('debug').child('RecordingManager');

        logger.debug('tick');
        logger.info('started');

        expect(log).toHaveBeenNthCalledWith(1, '[RecordingManager] [DEBUG] tick');
        expect(log).toHaveBeenNthCalledWith(2, '[RecordingManager] started');
    });

    it('passes the error object through to console.error', () => {
        const logger = new Logger().child('AudioMixer');
        const failure = new Error('boom');

        logger.error('Mixing failed:', failure);
        logger.error('No cause');

        expect(error).toHaveBeenNthCalledWith(1, '[AudioMixer] Mixing failed:', failure);
        expect(error).toHaveBeenNthCalledWith(2, '[AudioMixer] No cause');
    });

    it('skips audit events when no log channel is set', async () => {
        const logger = new Logger('debug');

        await logger.logEvent('recording_1', { type: 'START', timestamp: new Date(0) });

        expect(log).toHaveBeenCalledWith('[DEBUG] No log channel set');
    });
});

describe('formatDuration', () => {
    it('formats milliseconds as HH:MM:SS', () => {
        expect(formatDuration(0)).toBe('00:00:00');
        expect(formatDuration(5_999)).toBe('00:00:05');
        expect(formatDuration(3_723_000)).toBe('01:02:03');
    });

    it('clamps negative durations to zero', () => {
        expect(formatDuration(-1_000)).toBe('00:00:00');
    });
});

describe('isLogLevel', () => {
    it('accepts known levels only', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('error')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });
});
