import { describe, expect, it, vi } from 'vitest';

import { resolveDecodeOptions } from '../src/core/decoder/index.js';
import { resolveEncodeOptions } from '../src/core/encoder/index.js';
import { createCallLogger, getLogger, Logger, NoopLogFacility } from '../src/utils/logging/logUtils.js';

function facility() {
    return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Logger', () => {
    it('should route levels to the facility', () => {
        const target = facility();
        const logger = new Logger('pack', target);

        logger.info('reading inputs');
        logger.success('done');
        logger.warn('name reused');
        logger.error('disk full');

        expect(target.log).toHaveBeenCalledWith(expect.stringContaining('[INFO] pack :: reading inputs'));
        expect(target.log).toHaveBeenCalledWith(expect.stringContaining('[SUCCESS] pack :: done'));
        expect(target.warn).toHaveBeenCalledWith(expect.stringContaining('[WARNING] pack :: name reused'));
        expect(target.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] pack :: disk full'));
        expect(target.log).toHaveBeenCalledTimes(2);
    });

    it('should only print debug output when verbose', () => {
        const quiet = facility();
        new Logger('decoder', quiet).debug('hidden');
        expect(quiet.log).not.toHaveBeenCalled();

        const loud = facility();
        new Logger('decoder', loud, true).debug('shown');
        expect(loud.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] decoder :: shown'));
    });

    it('should not keep logged messages', () => {
        const logger = new Logger('decoder', NoopLogFacility, true);
        logger.info('first');
        logger.debug('second');

        expect(Object.keys(logger).sort()).toEqual(['facility', 'name', 'verbose']);
    });

    it('should reuse a named logger only for the same facility and verbosity', () => {
        const first = getLogger('cache-test', NoopLogFacility);
        expect(getLogger('cache-test', NoopLogFacility)).toBe(first);
        expect(getLogger('cache-test', NoopLogFacility, true)).not.toBe(first);
        expect(getLogger('cache-test', NoopLogFacility, true).verbose).toBe(true);
    });

    it('should give every library call its own logger', () => {
        expect(createCallLogger('decoder', false)).not.toBe(createCallLogger('decoder', false));
        expect(resolveDecodeOptions({}).logger).not.toBe(resolveDecodeOptions({}).logger);
        expect(resolveEncodeOptions({}).logger).not.toBe(resolveEncodeOptions({}).logger);
        expect(resolveDecodeOptions({}).logger).not.toBe(getLogger('decoder', NoopLogFacility));
        expect(resolveEncodeOptions({ verbose: true }).logger.verbose).toBe(true);
    });
});
