#!/usr/bin/env node
// src/main.ts

import { loadConfig } from './config';
import { createLibraryStore } from './engine/libraryStore';
import { UserDirectory } from './auth/userDirectory';
import { SessionContext } from './session/sessionContext';
import { SessionController } from './cli/sessionController';
import { ReadlinePrompt } from './cli/prompt';
import { getErrorMessage } from './errors';
import { logError, setDebugLogging } from './telemetry/logger';

/**
 * Console entry point - one interactive session on stdin/stdout
 */
async function main(): Promise<void> {
    const config = loadConfig();
    setDebugLogging(config.debug);

    const store = createLibraryStore({
        dataFile: config.dataFile,
        loanPeriodDays: config.loanPeriodDays,
        maxActiveLoans: config.maxActiveLoans
    });
    const prompt = new ReadlinePrompt();
    const controller = new SessionController({
        store,
        users: new UserDirectory(),
        session: new SessionContext(),
        prompt
    });

    try {
        await controller.run();
    } finally {
        prompt.close();
    }
}

if (require.main === module) {
    main().catch(error => {
        logError(`Fatal: ${getErrorMessage(error)}`);
        process.exitCode = 1;
    });
}
