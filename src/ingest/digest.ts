/**
 * Digest writer - the default ingestion engine.
 *
 * Produces a single text file: a short summary, the directory structure of the kept
 * files, then every kept file framed by separator lines.
 */

import { mkdirSync, writeFileSync, statSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import { renderTree } from '../context/tree.js';
import { readFiles, type FileEntry, type SkippedEntry } from './reader.js';

const SEPARATOR = '='.repeat(48);

/** Rough chars-per-token ratio for the summary estimate */
const CHARS_PER_TOKEN = 4;

export interface IngestParams {
    /** Directory (or single file) to digest */
    sourcePath: string;
    /** Where the digest is written */
    outputPath: string;
    /** Files larger than this many bytes are skipped */
    maxFileSize: number;
    /** When given, only files matching one of these are kept */
    includePatterns?: ReadonlySet<string>;
    excludePatterns?: ReadonlySet<string>;
}

export interface IngestSummary {
    summary: string;
    fileCount: number;
    skipped: SkippedEntry[];
    outputPath: string;
}

/** Anything that can turn a source tree into a digest file. */
export interface Ingestor {
    ingest(params: IngestParams): Promise<IngestSummary>;
}

export function estimateTokens(text: string): number {
    return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Assemble the digest text. The tree is passed in already rendered.
 */
export function formatDigest(rootName: string, tree: string, files: FileEntry[]): { summary: string; text: string } {
    const sections: string[] = [];
    for (const file of files) {
        sections.push(`${SEPARATOR}\nFILE: ${file.relativePath}\n${SEPARATOR}\n${file.content}\n`);
    }
    const body = `Directory structure:\n${tree}\n${sections.join('\n')}`;

    const summary = [
        `Directory: ${rootName}`,
        `Files analyzed: ${files.length}`,
        `Estimated tokens: ${estimateTokens(body)}`,
    ].join('\n');

    return { summary, text: `${summary}\n\n${body}` };
}

export class FileDigestIngestor implements Ingestor {
    constructor(private readonly verbose: boolean = false) {}

    async ingest(params: IngestParams): Promise<IngestSummary> {
        const sourcePath = resolve(params.sourcePath);
        const result = readFiles(sourcePath, {
            maxFileSize: params.maxFileSize,
            include: params.includePatterns,
            exclude: params.excludePatterns,
        });

        if (this.verbose) {
            console.log(`  Read ${result.files.length} file(s), ${result.totalSize} bytes`);
            for (const { path, reason } of result.skipped) {
                console.log(`  Skipped ${path} (${reason})`);
            }
        }

        const tree = statSync(sourcePath).isDirectory()
            ? renderTree(sourcePath, { maxDepth: Number.POSITIVE_INFINITY, include: keptPathFilter(result.files) })
            : `${basename(sourcePath)}\n`;

        const { summary, text } = formatDigest(basename(sourcePath), tree, result.files);

        const outputPath = resolve(params.outputPath);
        mkdirSync(dirname(outputPath), { recursive: true });
        writeFileSync(outputPath, text, 'utf-8');

        return { summary, fileCount: result.files.length, skipped: result.skipped, outputPath };
    }
}

/** Tree filter that shows kept files and the directories leading to them. */
function keptPathFilter(files: FileEntry[]): (relativePath: string, isDirectory: boolean) => boolean {
    const keptFiles = new Set<string>();
    const keptDirs = new Set<string>();
    for (const { relativePath } of files) {
        keptFiles.add(relativePath);
        const parts = relativePath.split('/');
        for (let i = 1; i < parts.length; i++) {
            keptDirs.add(parts.slice(0, i).join('/'));
        }
    }
    return (relativePath, isDirectory) => (isDirectory ? keptDirs.has(relativePath) : keptFiles.has(relativePath));
}
