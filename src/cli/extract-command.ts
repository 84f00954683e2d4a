import type { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { loadConfig } from '../boundaries/config-loader';
import { parseExtractOptions } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import { ContentExtractor } from '../extraction/content-extractor';
import { ContentScorer } from '../extraction/content-scorer';
import { createScoringPatterns } from '../extraction/scoring-patterns';
import { debug, log, setVerboseMode } from '../output/logger';
import { printMetadataTable } from '../output/reporter';
import type { ExtractionOptionsInput } from '../schemas/extraction-schemas';

export function registerExtractCommand(program: Command): void {
    program
        .command('extract')
        .description('Extract the main content of an HTML file')
        .argument('<file>', 'Path to the HTML file')
        .option('--base-url <url>', 'Resolve relative links and image sources against this URL')
        .option('--aggressive', 'Remove low-quality blocks inside the selected content', false)
        .option('--metadata', 'Print the <meta> values found in the page before the content', false)
        .option('--config <path>', 'Path to a custom ragprep.ini config file')
        .option('-v, --verbose', 'Enable verbose logging', false)
        .action((file: string, rawOptions: unknown) => {
            try {
                executeExtract(file, rawOptions);
            } catch (e: unknown) {
                const err = handleUnknownError(e, 'execute extract');
                console.error(`Error: ${err.message}`);
                process.exit(1);
            }
        });
}

function executeExtract(file: string, rawOptions: unknown): void {
    const options = parseExtractOptions(rawOptions);
    setVerboseMode(options.verbose);

    if (!existsSync(file)) {
        throw new Error(`HTML file not found: ${file}`);
    }

    // CLI flags override the config file
    const config = loadConfig(process.cwd(), options.config);
    const extractionOptions: ExtractionOptionsInput = {
        ...config.extraction,
        aggressiveCleaning: options.aggressive || config.extraction.aggressiveCleaning,
    };
    const baseUrl = options.baseUrl ?? config.extraction.baseUrl;
    if (baseUrl !== undefined) {
        extractionOptions.baseUrl = baseUrl;
    }

    const extractor = new ContentExtractor(new ContentScorer(createScoringPatterns(config.scoring)));
    const html = readFileSync(file, 'utf-8');
    debug(`Extracting ${file} (${html.length} chars)`);

    const pageMetadata: Record<string, string> = {};
    const content = extractor.extract(html, pageMetadata, extractionOptions);

    if (options.metadata) {
        printMetadataTable(pageMetadata);
    }
    log(content);
}
