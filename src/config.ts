/**
 * Run configuration
 *
 * Sources, highest priority first:
 *   1. CLI flags given explicitly
 *   2. Process environment, then .env in the working directory (GEMINI_API_KEY, GEMINI_MODEL)
 *   3. JSON config file (--config-path)
 *   4. Defaults
 *
 * Exclude and include patterns are additive: config file patterns and CLI patterns are merged.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { DEFAULT_MAX_DEPTH } from './context/tree.js';
import { parsePatterns, toPatternPayload } from './context/patterns.js';
import { DEFAULT_GEMINI_MODEL, DEFAULT_TIMEOUT_MS } from './ai/gemini.js';
import { DEFAULT_RETRIES } from './ai/pattern-generator.js';

export const API_KEY_ENV = 'GEMINI_API_KEY';
export const MODEL_ENV = 'GEMINI_MODEL';
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

// ── Types ───────────────────────────────────────────────────────────────────

/** Values read from the JSON config file. All optional. */
export interface FileConfig {
    apiKey?: string;
    model?: string;
    maxDepth?: number;
    retries?: number;
    maxSize?: number;
    exclude?: string[];
    include?: string[];
    autoExclude?: boolean;
    cache?: boolean;
    cacheTtlDays?: number;
    cacheMaxEntries?: number;
    timeoutSecs?: number;
    verbose?: boolean;
}

/** Values the user passed on the command line. Only explicitly given flags are set. */
export interface CliOverrides {
    apiKey?: string;
    model?: string;
    maxDepth?: number;
    retries?: number;
    maxSize?: number;
    exclude?: string[];
    include?: string[];
    autoExclude?: boolean;
    cache?: boolean;
    verbose?: boolean;
}

export type ApiKeySource = '--api-key' | typeof API_KEY_ENV | '.env' | 'config';

export interface RunConfig {
    readonly apiKey?: string;
    readonly apiKeySource?: ApiKeySource;
    readonly model: string;
    readonly maxDepth: number;
    readonly retries: number;
    readonly maxFileSize: number;
    readonly excludePatterns: ReadonlySet<string>;
    readonly includePatterns: ReadonlySet<string>;
    readonly autoExclude: boolean;
    readonly cache: {
        readonly enabled: boolean;
        readonly ttlDays?: number;
        readonly maxEntries?: number;
    };
    readonly timeoutMs: number;
    readonly verbose: boolean;
}

export interface ResolvedConfig {
    config: RunConfig;
    /** Conditions that change behaviour without stopping the run */
    warnings: string[];
}

// ── .env ────────────────────────────────────────────────────────────────────

function unquoteEnvValue(value: string): string {
    const trimmed = value.trim();
    if (
        (trimmed.startsWith('"') && trimmed.endsWith('"')) ||
        (trimmed.startsWith("'") && trimmed.endsWith("'"))
    ) {
        return trimmed.slice(1, -1).trim();
    }
    return trimmed;
}

/**
 * Read KEY=value pairs from a .env file. Missing or unreadable files yield an empty map.
 */
export function readDotEnv(envPath: string = resolve('.env')): Record<string, string> {
    if (!existsSync(envPath)) return {};

    let content: string;
    try {
        content = readFileSync(envPath, 'utf-8');
    } catch (error) {
        console.warn(`Warning: could not read ${envPath}: ${error instanceof Error ? error.message : error}`);
        return {};
    }

    const values: Record<string, string> = {};
    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#')) continue;

        const normalized = trimmed.startsWith('export ') ? trimmed.slice(7).trim() : trimmed;
        const eq = normalized.indexOf('=');
        if (eq <= 0) continue;

        const key = normalized.slice(0, eq).trim();
        const value = unquoteEnvValue(normalized.slice(eq + 1));
        if (value) values[key] = value;
    }
    return values;
}

// ── Config file ─────────────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'apiKey', 'model',
    'maxDepth', 'retries', 'maxSize',
    'exclude', 'include', 'autoExclude',
    'cache', 'cacheTtlDays', 'cacheMaxEntries',
    'timeoutSecs', 'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new Error(`Config "${key}" must be a string`);
    return val;
}

function assertNumber(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number') throw new Error(`Config "${key}" must be a number`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return val;
}

/** A comma-separated string or an array of strings, cleaned like CLI patterns. */
function assertPatterns(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    const isStringArray = Array.isArray(val) && val.every(v => typeof v === 'string');
    if (typeof val !== 'string' && !isStringArray) {
        throw new Error(`Config "${key}" must be a string or an array of strings`);
    }
    return parsePatterns(toPatternPayload(val));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and validate a JSON config file.
 *
 * - Resolves configPath relative to CWD
 * - Throws on missing file, invalid JSON or a wrongly typed value
 */
export function loadConfigFile(configPath: string): FileConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }
    const obj = parsed;

    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: FileConfig = {};

    if (obj.apiKey !== undefined) config.apiKey = assertString(obj, 'apiKey');
    if (obj.model !== undefined) config.model = assertString(obj, 'model');

    if (obj.maxDepth !== undefined) config.maxDepth = assertNumber(obj, 'maxDepth');
    if (obj.retries !== undefined) config.retries = assertNumber(obj, 'retries');
    if (obj.maxSize !== undefined) config.maxSize = assertNumber(obj, 'maxSize');

    if (obj.exclude !== undefined) config.exclude = assertPatterns(obj, 'exclude');
    if (obj.include !== undefined) config.include = assertPatterns(obj, 'include');
    if (obj.autoExclude !== undefined) config.autoExclude = assertBoolean(obj, 'autoExclude');

    if (obj.cache !== undefined) config.cache = assertBoolean(obj, 'cache');
    if (obj.cacheTtlDays !== undefined) config.cacheTtlDays = assertNumber(obj, 'cacheTtlDays');
    if (obj.cacheMaxEntries !== undefined) config.cacheMaxEntries = assertNumber(obj, 'cacheMaxEntries');

    if (obj.timeoutSecs !== undefined) config.timeoutSecs = assertNumber(obj, 'timeoutSecs');
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── Resolution ──────────────────────────────────────────────────────────────

function requireInteger(value: number, key: string, min: number): number {
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`"${key}" must be an integer >= ${min}, got ${value}`);
    }
    return value;
}

function resolveApiKey(
    cli: CliOverrides,
    file: FileConfig,
    env: NodeJS.ProcessEnv,
    dotEnv: Record<string, string>
): { apiKey?: string; source?: ApiKeySource } {
    const fromCli = cli.apiKey?.trim();
    if (fromCli) return { apiKey: fromCli, source: '--api-key' };

    const fromEnv = env[API_KEY_ENV]?.trim();
    if (fromEnv) return { apiKey: fromEnv, source: API_KEY_ENV };

    const fromDotEnv = dotEnv[API_KEY_ENV]?.trim();
    if (fromDotEnv) return { apiKey: fromDotEnv, source: '.env' };

    const fromConfig = file.apiKey?.trim();
    if (fromConfig) return { apiKey: fromConfig, source: 'config' };

    return {};
}

function patternSet(...lists: (string[] | undefined)[]): Set<string> {
    const items = lists.flatMap(list => list ?? []);
    return new Set(parsePatterns({ kind: 'items', items }));
}

/**
 * Merge every source into one immutable RunConfig.
 * Throws on out-of-range numbers; a missing credential only disables auto-exclusion.
 */
export function resolveRunConfig(
    cli: CliOverrides,
    file: FileConfig = {},
    env: NodeJS.ProcessEnv = process.env,
    dotEnv: Record<string, string> = readDotEnv()
): ResolvedConfig {
    const warnings: string[] = [];
    const { apiKey, source } = resolveApiKey(cli, file, env, dotEnv);

    const model = cli.model?.trim()
        || env[MODEL_ENV]?.trim()
        || dotEnv[MODEL_ENV]?.trim()
        || file.model?.trim()
        || DEFAULT_GEMINI_MODEL;

    let autoExclude = cli.autoExclude ?? file.autoExclude ?? true;
    if (autoExclude && !apiKey) {
        warnings.push(
            `No Gemini API key found (--api-key or ${API_KEY_ENV}). Automatic exclusion is disabled.`
        );
        autoExclude = false;
    }

    const timeoutSecs = file.timeoutSecs;
    if (timeoutSecs !== undefined && !(timeoutSecs > 0)) {
        throw new Error(`"timeoutSecs" must be a positive number, got ${timeoutSecs}`);
    }

    const config: RunConfig = Object.freeze({
        apiKey,
        apiKeySource: source,
        model,
        maxDepth: requireInteger(cli.maxDepth ?? file.maxDepth ?? DEFAULT_MAX_DEPTH, 'maxDepth', 0),
        retries: requireInteger(cli.retries ?? file.retries ?? DEFAULT_RETRIES, 'retries', 1),
        maxFileSize: requireInteger(cli.maxSize ?? file.maxSize ?? DEFAULT_MAX_FILE_SIZE, 'maxSize', 1),
        excludePatterns: patternSet(file.exclude, cli.exclude),
        includePatterns: patternSet(file.include, cli.include),
        autoExclude,
        cache: {
            enabled: cli.cache ?? file.cache ?? true,
            ttlDays: file.cacheTtlDays,
            maxEntries: file.cacheMaxEntries,
        },
        timeoutMs: timeoutSecs !== undefined ? timeoutSecs * 1000 : DEFAULT_TIMEOUT_MS,
        verbose: cli.verbose ?? file.verbose ?? false,
    });

    return { config, warnings };
}
