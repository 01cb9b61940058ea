/**
 * File Reader - Walks the ingest root and reads the selected text files.
 */

import { readdirSync, readFileSync, lstatSync, openSync, readSync, closeSync } from 'fs';
import { basename, join } from 'path';
import { hasBinaryExtension, isDirectoryTraversed, isFileSelected, type SelectionPatterns } from './filter.js';

/** Bytes inspected when sniffing a file for binary content */
const SNIFF_BYTES = 8000;

export type SkipReason = 'excluded' | 'too-large' | 'binary' | 'stat-error' | 'read-error';

export interface FileEntry {
    /** Path relative to the ingest root, '/'-separated */
    relativePath: string;
    /** Absolute path */
    absolutePath: string;
    content: string;
    /** File size in bytes */
    size: number;
}

export interface SkippedEntry {
    path: string;
    reason: SkipReason;
}

export interface ReadOptions extends SelectionPatterns {
    /** Files larger than this many bytes are skipped */
    maxFileSize: number;
}

export interface ReadResult {
    files: FileEntry[];
    /** Total bytes of content */
    totalSize: number;
    skipped: SkippedEntry[];
}

interface WalkContext {
    options: ReadOptions;
    files: FileEntry[];
    skipped: SkippedEntry[];
}

/**
 * Read every selected text file under rootPath, in sorted path order.
 * A file root is read on its own, under its base name.
 */
export function readFiles(rootPath: string, options: ReadOptions): ReadResult {
    const ctx: WalkContext = { options, files: [], skipped: [] };
    const rootStats = lstatSync(rootPath);
    if (rootStats.isFile()) {
        visitFile(rootPath, basename(rootPath), rootStats.size, ctx);
    } else {
        walkDir(rootPath, '', ctx);
    }
    return {
        files: ctx.files,
        totalSize: ctx.files.reduce((sum, f) => sum + f.size, 0),
        skipped: ctx.skipped,
    };
}

function walkDir(currentPath: string, relDir: string, ctx: WalkContext): void {
    let names: string[];
    try {
        names = readdirSync(currentPath);
    } catch {
        ctx.skipped.push({ path: relDir || '.', reason: 'read-error' });
        return;
    }

    // Code-unit order, same as the tree renderer
    names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    for (const name of names) {
        const fullPath = join(currentPath, name);
        const relPath = relDir ? `${relDir}/${name}` : name;

        let stats;
        try {
            stats = lstatSync(fullPath);
        } catch {
            ctx.skipped.push({ path: relPath, reason: 'stat-error' });
            continue;
        }

        if (stats.isDirectory()) {
            if (!isDirectoryTraversed(relPath, ctx.options)) {
                ctx.skipped.push({ path: `${relPath}/`, reason: 'excluded' });
                continue;
            }
            walkDir(fullPath, relPath, ctx);
            continue;
        }

        // Symlinks and special files are not followed
        if (!stats.isFile()) continue;

        visitFile(fullPath, relPath, stats.size, ctx);
    }
}

function visitFile(fullPath: string, relPath: string, size: number, ctx: WalkContext): void {
    if (!isFileSelected(relPath, ctx.options)) {
        ctx.skipped.push({ path: relPath, reason: 'excluded' });
        return;
    }
    if (size > ctx.options.maxFileSize) {
        ctx.skipped.push({ path: relPath, reason: 'too-large' });
        return;
    }
    if (hasBinaryExtension(basename(relPath))) {
        ctx.skipped.push({ path: relPath, reason: 'binary' });
        return;
    }

    try {
        if (looksBinary(fullPath)) {
            ctx.skipped.push({ path: relPath, reason: 'binary' });
            return;
        }
        ctx.files.push({
            relativePath: relPath,
            absolutePath: fullPath,
            content: readFileSync(fullPath, 'utf-8'),
            size,
        });
    } catch {
        ctx.skipped.push({ path: relPath, reason: 'read-error' });
    }
}

/** A NUL byte near the start of a file marks it as binary. */
function looksBinary(path: string): boolean {
    const fd = openSync(path, 'r');
    try {
        const buffer = Buffer.alloc(SNIFF_BYTES);
        const bytesRead = readSync(fd, buffer, 0, SNIFF_BYTES, 0);
        return buffer.subarray(0, bytesRead).includes(0);
    } finally {
        closeSync(fd);
    }
}
