import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as core from '@actions/core';
import { run } from '../src/main';

jest.mock('@actions/core');

describe('Action entry point', () => {
    let dir: string;
    let inputs: Record<string, string>;

    beforeEach(() => {
        jest.resetAllMocks();
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'main-test-'));
        const csvPath = path.join(dir, 'book.csv');
        fs.writeFileSync(csvPath, 'Lesson #,Ex/Voc,Sing. / Perf.,English,Sura,Verse,Exercise #\n16,Exercise,نَبْعَثُ,one,16,89,1\n', 'utf-8');
        inputs = { 'input-path': csvPath, 'output-path': path.join(dir, 'book.tex') };
        jest.mocked(core.getInput).mockImplementation((name: string) => inputs[name] ?? '');
    });

    afterEach(() => {
        delete process.env.QURAN_API_TIMEOUT_MS;
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should render without enrichment when the API timeout is invalid', async () => {
        process.env.QURAN_API_TIMEOUT_MS = 'ten seconds';

        await run();

        expect(core.setFailed).not.toHaveBeenCalled();
        expect(core.warning).toHaveBeenCalledWith("QURAN_API_TIMEOUT_MS must be a positive whole number of milliseconds, got 'ten seconds'");
        expect(core.setOutput).toHaveBeenCalledWith('tex-path', path.join(dir, 'book.tex'));
        expect(fs.readFileSync(path.join(dir, 'book.tex'), 'utf-8')).toContain('one\n\n\\textbf{[16:89]}\n\n');
        expect(fs.existsSync(path.join(dir, 'book.json'))).toBe(true);
    });

    it('should fail the action when the input cannot be read', async () => {
        inputs['input-path'] = path.join(dir, 'missing.csv');

        await run();

        expect(core.setFailed).toHaveBeenCalledWith(`${path.join(dir, 'missing.csv')}: file not found`);
    });
});
