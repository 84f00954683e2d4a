import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import type { DocumentChunk } from '../chunking/types';

const PREVIEW_LENGTH = 60;

export function printFileHeader(fileRelPath: string) {
  const cwd = process.cwd();
  const absPath = path.resolve(cwd, fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  console.log(chalk.underline(link));
}

function padVisible(text: string, width: number): string {
  const pad = Math.max(0, width - stripAnsi(text).length);
  return text + ' '.repeat(pad);
}

/**
 * First line of the chunk body, collapsed and cut to a fixed width.
 */
export function previewText(content: string, maxLength: number = PREVIEW_LENGTH): string {
  const collapsed = content.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= maxLength) return collapsed;
  return `${collapsed.slice(0, maxLength - 1)}…`;
}

export function formatChunkRow(chunk: DocumentChunk<unknown>, opts: { indexWidth?: number; rangeWidth?: number } = {}): string {
  const indexWidth = opts.indexWidth ?? 4;
  const rangeWidth = opts.rangeWidth ?? 13;

  const indexCell = padVisible(chalk.cyan(`#${chunk.chunkIndex}`), indexWidth);
  const rangeCell = padVisible(`${chunk.startPosition}-${chunk.endPosition}`, rangeWidth);
  const tokenCell = padVisible(chalk.bold(`${chunk.tokenCount}`), 5) + chalk.dim('tok');
  const title = chunk.title ? chalk.dim(chunk.title) : '';

  return `  ${indexCell} ${rangeCell} ${tokenCell}  ${previewText(chunk.content)}  ${title}`.trimEnd();
}

export function printChunkRow(chunk: DocumentChunk<unknown>) {
  console.log(formatChunkRow(chunk));
}

export function printChunkSummary(documentId: string, chunks: readonly DocumentChunk<unknown>[]) {
  const totalTokens = chunks.reduce((sum, c) => sum + c.tokenCount, 0);
  const okMark = chunks.length > 0 ? chalk.green('✓') : chalk.red('✖');
  const chunkTxt = chunks.length === 1 ? '1 chunk' : `${chunks.length} chunks`;
  const tokenTxt = totalTokens === 1 ? '1 token' : `${totalTokens} tokens`;

  // "✓ N chunks (M tokens) for <id>."
  console.log(`${okMark} ${chunkTxt} (${tokenTxt}) for ${chalk.cyan(documentId)}.`);
}

export function printMetadataTable(metadata: Readonly<Record<string, string>>) {
  const keys = Object.keys(metadata).sort();
  if (keys.length === 0) return;

  const width = Math.max(...keys.map((k) => k.length)) + 2;
  console.log(chalk.bold('Metadata:'));
  for (const key of keys) {
    console.log(`  ${padVisible(chalk.cyan(key), width)}${metadata[key] ?? ''}`);
  }
  console.log('');
}
