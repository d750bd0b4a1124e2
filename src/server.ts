// src/server.ts

import { createApp } from './app';
import { loadConfig } from './config';
import { createLibraryStore } from './engine/libraryStore';
import { UserDirectory } from './auth/userDirectory';
import { logInfo, setDebugLogging } from './telemetry/logger';

/**
 * HTTP entry point - serves the same store the console uses, over Express
 */
function startServer(): void {
    const config = loadConfig();
    setDebugLogging(config.debug);

    const store = createLibraryStore({
        dataFile: config.dataFile,
        loanPeriodDays: config.loanPeriodDays,
        maxActiveLoans: config.maxActiveLoans
    });
    const app = createApp({ store, users: new UserDirectory() });

    app.listen(config.port, () => {
        logInfo(`Library API running on port ${config.port}`, { dataFile: config.dataFile });
    });
}

if (require.main === module) {
    startServer();
}
