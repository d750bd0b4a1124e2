import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_PORT, loadConfig } from '../index';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('loadConfig', () => {
    it('uses the defaults for an empty environment', () => {
        expect(loadConfig({}, '/srv/library')).toEqual({
            dataFile: path.resolve('/srv/library', 'library_data.json'),
            port: 3000,
            loanPeriodDays: 7,
            maxActiveLoans: 3,
            debug: false
        });
    });

    it('reads the data file, port and debug flag from the environment', () => {
        const config = loadConfig(
            { LIBRARY_DATA_FILE: 'data/books.json', PORT: '8080', LIBRARY_DEBUG: '1' },
            '/srv/library'
        );

        expect(config.dataFile).toBe(path.resolve('/srv/library', 'data/books.json'));
        expect(config.port).toBe(8080);
        expect(config.debug).toBe(true);
    });

    it('keeps an absolute data file path as given', () => {
        expect(loadConfig({ LIBRARY_DATA_FILE: '/var/lib/library.json' }, '/srv').dataFile).toBe('/var/lib/library.json');
    });

    it('falls back to the default port with a warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        expect(loadConfig({ PORT: 'eighty' }).port).toBe(DEFAULT_PORT);
        expect(warn).toHaveBeenCalledWith(`[WARN] Ignoring invalid PORT "eighty", using ${DEFAULT_PORT}`);
    });
});
