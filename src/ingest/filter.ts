/**
 * Ingest Filter - Decides which paths the digest reads.
 *
 * Patterns follow the usual ignore-file conventions:
 * - a trailing '/' restricts the pattern to directories
 * - a pattern without '/' matches the base name at any depth
 * - a leading './' or '/' anchors nothing and is dropped
 * - a leading '!' is part of the name, not a negation
 * A path matches when it, or any directory above it, matches.
 */

import micromatch from 'micromatch';

/** File extensions that are never text worth digesting */
const BINARY_EXTENSIONS: Set<string> = new Set([
    '.png', '.jpg', '.jpeg', '.gif', '.bmp', '.ico', '.webp', '.avif',
    '.mp3', '.mp4', '.avi', '.mov', '.webm', '.ogg', '.wav',
    '.zip', '.tar', '.gz', '.bz2', '.7z', '.rar', '.xz',
    '.exe', '.dll', '.so', '.dylib', '.bin',
    '.pdf', '.woff', '.woff2', '.ttf', '.eot',
    '.pyc', '.class', '.o',
]);

export function hasBinaryExtension(fileName: string): boolean {
    const lower = fileName.toLowerCase();
    const dotIdx = lower.lastIndexOf('.');
    return dotIdx !== -1 && BINARY_EXTENSIONS.has(lower.slice(dotIdx));
}

interface CompiledPattern {
    glob: string;
    directoryOnly: boolean;
    matchBase: boolean;
}

function compilePattern(pattern: string): CompiledPattern | null {
    let glob = pattern.trim();
    if (glob.startsWith('./')) glob = glob.slice(2);
    while (glob.startsWith('/')) glob = glob.slice(1);

    const directoryOnly = glob.endsWith('/');
    glob = glob.replace(/\/+$/, '');
    if (!glob) return null;

    return { glob, directoryOnly, matchBase: !glob.includes('/') };
}

/**
 * Does this single path (not its ancestors) match the pattern?
 * relativePath is '/'-separated and relative to the ingest root.
 */
export function matchesPattern(relativePath: string, isDirectory: boolean, pattern: string): boolean {
    const compiled = compilePattern(pattern);
    if (!compiled) return false;
    if (compiled.directoryOnly && !isDirectory) return false;
    return micromatch.isMatch(relativePath, compiled.glob, {
        dot: true,
        basename: compiled.matchBase,
        nonegate: true,
    });
}

/**
 * Does the path, or any directory above it, match one of the patterns?
 */
export function matchesAny(relativePath: string, isDirectory: boolean, patterns: Iterable<string>): boolean {
    const list = [...patterns];
    if (list.length === 0) return false;

    const parts = relativePath.split('/').filter(Boolean);
    for (let i = 1; i <= parts.length; i++) {
        const candidate = parts.slice(0, i).join('/');
        const candidateIsDir = i < parts.length || isDirectory;
        if (list.some(p => matchesPattern(candidate, candidateIsDir, p))) return true;
    }
    return false;
}

export interface SelectionPatterns {
    include?: ReadonlySet<string>;
    exclude?: ReadonlySet<string>;
}

/**
 * Selection rule shared by the walker and the digest tree.
 * With include patterns a file is kept only if it matches one of them; includes override
 * excludes. Without them a file is kept unless it matches an exclude pattern.
 */
export function isFileSelected(relativePath: string, patterns: SelectionPatterns): boolean {
    if (patterns.include && patterns.include.size > 0) {
        return matchesAny(relativePath, false, patterns.include);
    }
    return !matchesAny(relativePath, false, patterns.exclude ?? []);
}

/**
 * Should the walker descend into this directory?
 * Directories are only pruned by excludes when no include patterns are set, since an
 * include may pick a file inside an excluded directory.
 */
export function isDirectoryTraversed(relativePath: string, patterns: SelectionPatterns): boolean {
    if (patterns.include && patterns.include.size > 0) return true;
    return !matchesAny(relativePath, true, patterns.exclude ?? []);
}
