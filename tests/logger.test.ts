import { describe, it, expect, vi, afterEach } from 'vitest';
import { debug, error, log, setSilentMode, setVerboseMode, warn } from '../src/output/logger';

describe('logger', () => {
    afterEach(() => {
        setSilentMode(false);
        setVerboseMode(false);
        vi.restoreAllMocks();
    });

    it('prefixes warnings', () => {
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

        warn('dropped 1 blank chunk');

        expect(warnSpy).toHaveBeenCalledWith('[ragprep] Warning:', 'dropped 1 blank chunk');
    });

    it('prints debug output only in verbose mode', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

        debug('hidden');
        setVerboseMode(true);
        debug('shown');

        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledWith('[ragprep]', 'shown');
    });

    it('silences everything but errors in silent mode', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        setSilentMode(true);
        setVerboseMode(true);

        log('a');
        warn('b');
        debug('c');
        error('d');

        expect(logSpy).not.toHaveBeenCalled();
        expect(warnSpy).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledWith('d');
    });
});
