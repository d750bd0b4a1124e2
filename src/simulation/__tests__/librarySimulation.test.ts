import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runSimulation } from '../librarySimulation';

describe('runSimulation', () => {
    let dir: string;

    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'library-sim-'));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('walks the lending rules and ends with every loan overdue', () => {
        const lines: string[] = [];
        const result = runSimulation({
            dataFile: path.join(dir, 'library_data.json'),
            clock: () => new Date(2025, 0, 10, 12, 0, 0),
            output: line => lines.push(line)
        });

        expect(result.steps).toHaveLength(14);
        expect(result.steps.filter(step => !step.ok).map(step => step.step)).toEqual(['borrow', 'borrow', 'delete']);
        expect(result.steps.map(step => step.detail)).toContain('alice refused on 2: LOAN_LIMIT_REACHED');
        expect(result.report).toEqual({ totalUniqueBooks: 4, totalCopies: 11, totalIssued: 4, overdue: 4 });
        expect(result.reloadedLoans).toBe(4);
        expect(lines).toContain('  Titles: 4, Copies: 11, Issued: 4, Overdue: 4');
    });

    it('starts over when the data file already exists', () => {
        const dataFile = path.join(dir, 'library_data.json');
        fs.writeFileSync(dataFile, '{"books": {}, "borrowed_records": []}');

        const result = runSimulation({ dataFile, output: () => {} });

        expect(result.steps[0]).toEqual({ step: 'seed', ok: true, detail: '3 sample books' });
    });
});
