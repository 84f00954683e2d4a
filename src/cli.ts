#!/usr/bin/env node
import { createRequire } from 'node:module';
import { program } from 'commander';
import { z } from 'zod';
import { registerExtractCommand } from './cli/extract-command';
import { registerChunkCommand } from './cli/chunk-command';

const REQUIRE = createRequire(import.meta.url);

const PACKAGE_JSON_SCHEMA = z.object({
  version: z.string(),
});

// Same relative path from src/ and dist/
const RAW_PACKAGE_JSON: unknown = REQUIRE('../package.json');
const PKG = PACKAGE_JSON_SCHEMA.parse(RAW_PACKAGE_JSON);

// Set up Commander program
program
  .name('ragprep')
  .description('Prepare HTML and Markdown documents for retrieval-augmented generation')
  .version(PKG.version);

// Register commands
registerExtractCommand(program);
registerChunkCommand(program);

// Parse command line arguments
program.parse();
