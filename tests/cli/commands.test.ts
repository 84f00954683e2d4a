import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { registerChunkCommand } from '../../src/cli/chunk-command';
import { registerExtractCommand } from '../../src/cli/extract-command';
import { setSilentMode, setVerboseMode } from '../../src/output/logger';

describe('CLI commands', () => {
    let program: Command;
    let tempDir: string;
    let iniPath: string;

    beforeEach(() => {
        program = new Command();
        registerExtractCommand(program);
        registerChunkCommand(program);

        tempDir = mkdtempSync(path.join(tmpdir(), 'ragprep-cli-'));
        // An empty explicit config keeps the caller's working directory out of the test
        iniPath = path.join(tempDir, 'test.ini');
        writeFileSync(iniPath, '');
    });

    afterEach(() => {
        rmSync(tempDir, { recursive: true, force: true });
        setSilentMode(false);
        setVerboseMode(false);
        vi.restoreAllMocks();
    });

    it('registers both commands with their options', () => {
        const extract = program.commands.find((c) => c.name() === 'extract');
        const chunk = program.commands.find((c) => c.name() === 'chunk');

        expect(extract?.options.map((o) => o.name())).toEqual(['base-url', 'aggressive', 'metadata', 'config', 'verbose']);
        expect(chunk?.options.map((o) => o.name())).toEqual(['id', 'title', 'output', 'config', 'verbose']);
    });

    it('prints chunks as JSON', async () => {
        const file = path.join(tempDir, 'guide.md');
        writeFileSync(file, '# Setup\nInstall it.\n\n# Use\nRun it.\n');
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

        await program.parseAsync(['node', 'ragprep', 'chunk', file, '--output', 'json', '--config', iniPath]);

        expect(logSpy).toHaveBeenCalledTimes(1);
        const output: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
        expect(output).toMatchObject({
            documentId: 'guide',
            metadata: { title: 'guide', sourceType: 'markdown', sourceUrl: file },
            chunks: [
                { id: 'guide_chunk_0', title: 'Setup', content: '# Setup\nInstall it.' },
                { id: 'guide_chunk_1', title: 'Use', content: '# Use\nRun it.' },
            ],
        });
    });

    it('honours an explicit document id', async () => {
        const file = path.join(tempDir, 'notes.md');
        writeFileSync(file, 'Plain notes.');
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

        await program.parseAsync(['node', 'ragprep', 'chunk', file, '--id', 'n-1', '--output', 'json', '--config', iniPath]);

        const output: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
        expect(output).toMatchObject({ documentId: 'n-1', chunks: [{ id: 'n-1_chunk_0', title: 'Untitled' }] });
    });

    it('prints the extracted main content', async () => {
        const file = path.join(tempDir, 'page.html');
        writeFileSync(
            file,
            '<body><nav><a href="/">Home</a></nav><article><h1>T</h1><p>See <a href="/x">this</a> page.</p></article></body>'
        );
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

        await program.parseAsync([
            'node', 'ragprep', 'extract', file, '--base-url', 'https://example.com/', '--config', iniPath,
        ]);

        expect(logSpy).toHaveBeenCalledWith(
            '<article><h1>T</h1><p>See <a href="https://example.com/x">this</a> page.</p></article>'
        );
    });

    it('reports a missing file and exits with 1', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation((code) => {
            throw new Error(`process.exit(${String(code)})`);
        });
        const missing = path.join(tempDir, 'missing.md');

        await expect(
            program.parseAsync(['node', 'ragprep', 'chunk', missing, '--config', iniPath])
        ).rejects.toThrow('process.exit(1)');
        expect(errorSpy).toHaveBeenCalledWith(`Error: Markdown file not found: ${missing}`);
    });

    it('rejects an unknown output format', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation((code) => {
            throw new Error(`process.exit(${String(code)})`);
        });
        const file = path.join(tempDir, 'doc.md');
        writeFileSync(file, '# A\nb');

        await expect(
            program.parseAsync(['node', 'ragprep', 'chunk', file, '--output', 'xml', '--config', iniPath])
        ).rejects.toThrow('process.exit(1)');
        expect(String(errorSpy.mock.calls[0]?.[0])).toMatch(/^Error: Invalid chunk options:/);
    });
});
