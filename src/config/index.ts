// src/config/index.ts

import path from 'node:path';
import { logWarning } from '../telemetry/logger';

export const DEFAULT_DATA_FILE = 'library_data.json';
export const DEFAULT_PORT = 3000;
export const DEFAULT_LOAN_PERIOD_DAYS = 7;
export const DEFAULT_MAX_ACTIVE_LOANS = 3;

/**
 * Runtime configuration
 *
 * Only the data file location, HTTP port and debug flag come from the
 * environment. Lending rules are fixed.
 */
export interface LibraryConfig {
    dataFile: string;            // Absolute path of the JSON document
    port: number;
    loanPeriodDays: number;
    maxActiveLoans: number;
    debug: boolean;
}

type Env = Record<string, string | undefined>;

function parsePort(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') {
        return DEFAULT_PORT;
    }

    const port = Number(raw);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        logWarning(`Ignoring invalid PORT "${raw}", using ${DEFAULT_PORT}`);
        return DEFAULT_PORT;
    }
    return port;
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): LibraryConfig {
    const dataFile = env.LIBRARY_DATA_FILE?.trim() || DEFAULT_DATA_FILE;

    return {
        dataFile: path.resolve(cwd, dataFile),
        port: parsePort(env.PORT),
        loanPeriodDays: DEFAULT_LOAN_PERIOD_DAYS,
        maxActiveLoans: DEFAULT_MAX_ACTIVE_LOANS,
        debug: env.LIBRARY_DEBUG === '1'
    };
}
