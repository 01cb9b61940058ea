/**
 * Pattern Cache
 *
 * Stores validated pattern lists on disk so an unchanged tree does not cost another
 * model call. Files live in one directory, namespaced as {ns}__{key}.json.
 */

import { createHash } from 'crypto';
import {
    existsSync, mkdirSync, readFileSync, writeFileSync,
    readdirSync, statSync, unlinkSync,
} from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

const DAY_MS = 24 * 60 * 60 * 1000;

// ── Internal types ────────────────────────────────────────────────────────────

interface StoredEntry {
    value: unknown;
    timestamp: number;
}

export interface CacheConfig {
    cacheDir?: string;
    ttlDays?: number;
    maxEntries?: number;
    verbose?: boolean;
}

export const DEFAULT_CACHE_DIR = join(tmpdir(), 'ingestprep-cache');

// ── Key helper ────────────────────────────────────────────────────────────────

/**
 * Build a deterministic cache key from an arbitrary list of values.
 * Strings are hashed directly; everything else is JSON-serialised first.
 */
export function makeKey(...parts: unknown[]): string {
    const hash = createHash('sha256');
    for (const part of parts) {
        hash.update(typeof part === 'string' ? part : JSON.stringify(part));
        hash.update('\0');
    }
    return hash.digest('hex');
}

function isStoredEntry(value: unknown): value is StoredEntry {
    return typeof value === 'object'
        && value !== null
        && 'timestamp' in value
        && typeof value.timestamp === 'number'
        && 'value' in value;
}

// ── PatternCache ──────────────────────────────────────────────────────────────

export class PatternCache {
    private readonly dir: string;
    private readonly ttlMs: number;
    private readonly max: number;
    private readonly verbose: boolean;

    constructor(config: CacheConfig = {}) {
        this.dir = config.cacheDir ?? DEFAULT_CACHE_DIR;
        this.ttlMs = (config.ttlDays ?? 7) * DAY_MS;
        this.max = config.maxEntries ?? 100;
        this.verbose = config.verbose ?? false;
    }

    get directory(): string {
        return this.dir;
    }

    private ensureDir(): void {
        if (!existsSync(this.dir)) mkdirSync(this.dir, { recursive: true });
    }

    private filePath(ns: string, key: string): string {
        return join(this.dir, `${ns}__${key}.json`);
    }

    /**
     * Read a cached string list. Returns null on miss, expiry or a malformed entry.
     */
    getPatterns(ns: string, key: string): string[] | null {
        const path = this.filePath(ns, key);
        if (!existsSync(path)) {
            if (this.verbose) console.log(`  Cache miss [${ns}]: ${key.slice(0, 12)}...`);
            return null;
        }
        try {
            const entry: unknown = JSON.parse(readFileSync(path, 'utf-8'));
            if (!isStoredEntry(entry)) return null;
            if (Date.now() - entry.timestamp > this.ttlMs) {
                if (this.verbose) console.log(`  Cache expired [${ns}]: ${key.slice(0, 12)}...`);
                this.remove(path);
                return null;
            }
            const value = entry.value;
            if (!Array.isArray(value) || !value.every((p): p is string => typeof p === 'string')) {
                return null;
            }
            if (this.verbose) {
                const ageMin = Math.floor((Date.now() - entry.timestamp) / 60_000);
                console.log(`  Cache hit [${ns}]: ${key.slice(0, 12)}... (age: ${ageMin}m)`);
            }
            return value;
        } catch (err) {
            if (this.verbose) console.log(`  Cache read error [${ns}]: ${err}`);
            return null;
        }
    }

    /**
     * Write a string list to the cache. Write failures are logged, never thrown.
     */
    setPatterns(ns: string, key: string, patterns: readonly string[]): void {
        const entry: StoredEntry = { value: [...patterns], timestamp: Date.now() };
        try {
            this.ensureDir();
            writeFileSync(this.filePath(ns, key), JSON.stringify(entry), 'utf-8');
            if (this.verbose) console.log(`  Cached [${ns}]: ${key.slice(0, 12)}...`);
            this.prune();
        } catch (err) {
            console.warn(`Warning: could not write pattern cache: ${err instanceof Error ? err.message : err}`);
        }
    }

    /** Remove oldest entries when the total exceeds maxEntries. */
    private prune(): void {
        const files = readdirSync(this.dir)
            .filter(f => f.endsWith('.json'))
            .map(f => ({ path: join(this.dir, f), mtime: statSync(join(this.dir, f)).mtime.getTime() }))
            .sort((a, b) => b.mtime - a.mtime);

        if (files.length <= this.max) return;
        for (const { path } of files.slice(this.max)) {
            if (this.remove(path) && this.verbose) console.log(`  Pruned: ${path}`);
        }
    }

    private remove(path: string): boolean {
        try {
            unlinkSync(path);
            return true;
        } catch (err) {
            if (this.verbose) console.log(`  Cache cleanup failed for ${path}: ${err}`);
            return false;
        }
    }
}
