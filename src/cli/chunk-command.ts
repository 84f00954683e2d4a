import type { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { loadConfig } from '../boundaries/config-loader';
import { parseChunkOptions } from '../boundaries/cli-parser';
import { SemanticChunker } from '../chunking/semantic-chunker';
import { handleUnknownError } from '../errors/index';
import { debug, setSilentMode, setVerboseMode } from '../output/logger';
import { printChunkRow, printChunkSummary, printFileHeader } from '../output/reporter';
import { DocumentPreparer } from '../pipeline/document-preparer';
import { OutputFormat } from './types';

export function registerChunkCommand(program: Command): void {
    program
        .command('chunk')
        .description('Split a Markdown file into retrieval-sized chunks')
        .argument('<file>', 'Path to the Markdown file')
        .option('--id <id>', 'Document id (defaults to a slug of the title)')
        .option('--title <title>', 'Document title (frontmatter title wins when set)')
        .option('--output <format>', 'Output format: line (default) or json', OutputFormat.Line)
        .option('--config <path>', 'Path to a custom ragprep.ini config file')
        .option('-v, --verbose', 'Enable verbose logging', false)
        .action((file: string, rawOptions: unknown) => {
            try {
                executeChunk(file, rawOptions);
            } catch (e: unknown) {
                const err = handleUnknownError(e, 'execute chunk');
                console.error(`Error: ${err.message}`);
                process.exit(1);
            }
        });
}

function executeChunk(file: string, rawOptions: unknown): void {
    const options = parseChunkOptions(rawOptions);
    const outputFormat = options.output === 'json' ? OutputFormat.Json : OutputFormat.Line;

    // Keep stdout clean for machine-readable output
    setSilentMode(outputFormat === OutputFormat.Json);
    setVerboseMode(options.verbose);

    if (!existsSync(file)) {
        throw new Error(`Markdown file not found: ${file}`);
    }

    const config = loadConfig(process.cwd(), options.config);
    const preparer = new DocumentPreparer({ chunker: new SemanticChunker(config.chunking) });

    const content = readFileSync(file, 'utf-8');
    debug(`Read ${file} (${content.length} chars)`);

    const prepared = preparer.prepareMarkdown({
        content,
        documentId: options.id,
        title: options.title ?? path.basename(file, path.extname(file)),
        sourceUrl: path.resolve(file),
        sourceType: 'markdown',
    });

    if (outputFormat === OutputFormat.Json) {
        console.log(JSON.stringify(prepared, null, 2));
        return;
    }

    printFileHeader(path.relative(process.cwd(), file) || file);
    for (const chunk of prepared.chunks) {
        printChunkRow(chunk);
    }
    console.log('');
    printChunkSummary(prepared.documentId, prepared.chunks);
}
