// src/simulation/runLibrarySimulation.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runSimulation } from './librarySimulation';

if (require.main === module) {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'library-simulation-'));
    try {
        runSimulation({ dataFile: path.join(dir, 'library_data.json') });
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}
