/**
 * Pattern Generator - Asks the generation backend for exclude patterns and retries
 * until it gets a usable answer or runs out of attempts.
 *
 *   CONFIGURING ──fail──▶ ABORTED
 *        │
 *        ▼
 *   ATTEMPTING ──patterns──▶ SUCCEEDED
 *        │  ├─refusal──────▶ ABORTED
 *        │  ├─empty / invalid → next attempt (no delay)
 *        │  └─transport error → delay, next attempt
 *        ▼
 *      FAILED (budget spent)
 *
 * Ordinary failures never throw: the caller always gets a GenerationOutcome.
 */

import { GenerationRefusedError, type GenerationBackend } from './backend.js';
import { makeKey, type PatternCache } from './cache.js';
import { parsePatterns, PatternValidationError, toPatternPayload } from '../context/patterns.js';
import {
    EXCLUDE_SYSTEM_PROMPT,
    EXCLUDE_TEMPERATURE,
    EXCLUDE_MAX_OUTPUT_TOKENS,
    buildExcludePrompt,
} from './prompts.js';

export const DEFAULT_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;

const CACHE_NAMESPACE = 'patterns';

// ── Types ───────────────────────────────────────────────────────────────────

export type AttemptResult = 'patterns' | 'empty' | 'parse-failure' | 'transport-failure' | 'refusal';

export interface GenerationAttempt {
    /** 1-based attempt number */
    index: number;
    result: AttemptResult;
    rawText?: string;
    error?: string;
    durationMs: number;
}

export type GenerationOutcome =
    | { status: 'succeeded'; patterns: Set<string>; fromCache: boolean; attempts: GenerationAttempt[] }
    | { status: 'aborted'; reason: string; attempts: GenerationAttempt[] }
    | { status: 'failed'; lastError?: string; attempts: GenerationAttempt[] };

export interface PatternGeneratorOptions {
    backend: GenerationBackend;
    /** Model identifier, used for logging and the cache key */
    model: string;
    /** Total attempts allowed (default: 3) */
    retries?: number;
    /** Delay after the first transport failure; doubles on each later one (default: 1000ms) */
    baseDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
    /** When set, validated patterns are read from and written to this cache */
    cache?: PatternCache;
    verbose?: boolean;
}

const realSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

// ── PatternGenerator ────────────────────────────────────────────────────────

export class PatternGenerator {
    private readonly backend: GenerationBackend;
    private readonly model: string;
    private readonly retries: number;
    private readonly baseDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => number;
    private readonly cache?: PatternCache;
    private readonly verbose: boolean;

    constructor(options: PatternGeneratorOptions) {
        this.backend = options.backend;
        this.model = options.model;
        this.retries = options.retries ?? DEFAULT_RETRIES;
        this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
        this.sleep = options.sleep ?? realSleep;
        this.now = options.now ?? Date.now;
        this.cache = options.cache;
        this.verbose = options.verbose ?? false;
    }

    /**
     * Delay applied after a transport failure on the given (1-based) attempt.
     */
    backoffDelay(attempt: number): number {
        return this.baseDelayMs * 2 ** (attempt - 1);
    }

    async generate(tree: string): Promise<GenerationOutcome> {
        const attempts: GenerationAttempt[] = [];

        // ── CONFIGURING ─────────────────────────────────────────────────────
        const configError = this.configure();
        if (configError) {
            console.error(`Error configuring ${this.backend.name}: ${configError}`);
            return { status: 'aborted', reason: configError, attempts };
        }

        const prompt = buildExcludePrompt(tree);
        const cacheKey = makeKey(this.model, EXCLUDE_SYSTEM_PROMPT, prompt);
        const cached = this.cache?.getPatterns(CACHE_NAMESPACE, cacheKey);
        if (cached && cached.length > 0) {
            console.log(`Using cached exclude patterns (${cached.length})`);
            return { status: 'succeeded', patterns: new Set(cached), fromCache: true, attempts };
        }

        // ── ATTEMPTING ──────────────────────────────────────────────────────
        let lastError: string | undefined;

        for (let index = 1; index <= this.retries; index++) {
            console.log(`Calling ${this.backend.name} (Attempt ${index}/${this.retries})...`);
            const startedAt = this.now();

            let rawText: string;
            try {
                rawText = await this.backend.generate({
                    system: EXCLUDE_SYSTEM_PROMPT,
                    prompt,
                    temperature: EXCLUDE_TEMPERATURE,
                    maxOutputTokens: EXCLUDE_MAX_OUTPUT_TOKENS,
                });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                const durationMs = this.now() - startedAt;

                if (error instanceof GenerationRefusedError) {
                    attempts.push({ index, result: 'refusal', error: message, durationMs });
                    console.error(`Attempt ${index}/${this.retries}: request refused, not retrying: ${message}`);
                    return { status: 'aborted', reason: message, attempts };
                }

                attempts.push({ index, result: 'transport-failure', error: message, durationMs });
                lastError = message;
                console.error(`Attempt ${index}/${this.retries}: error calling ${this.backend.name}: ${message}`);

                if (index < this.retries) {
                    const delay = this.backoffDelay(index);
                    console.log(`  Retrying in ${delay / 1000}s...`);
                    await this.sleep(delay);
                }
                continue;
            }

            const durationMs = this.now() - startedAt;
            if (this.verbose) {
                console.log(`  Raw response (${durationMs}ms):\n---\n${rawText}\n---`);
            }

            let patterns: string[];
            try {
                patterns = parsePatterns(toPatternPayload(rawText));
            } catch (error) {
                if (!(error instanceof PatternValidationError)) throw error;
                attempts.push({ index, result: 'parse-failure', rawText, error: error.message, durationMs });
                lastError = error.message;
                console.error(`Attempt ${index}/${this.retries}: could not parse response: ${error.message}`);
                continue;
            }

            if (patterns.length === 0) {
                attempts.push({ index, result: 'empty', rawText, durationMs });
                lastError = 'empty pattern list';
                console.warn(`Attempt ${index}/${this.retries}: ${this.backend.name} returned an empty pattern list`);
                continue;
            }

            attempts.push({ index, result: 'patterns', rawText, durationMs });
            this.cache?.setPatterns(CACHE_NAMESPACE, cacheKey, patterns);
            return { status: 'succeeded', patterns: new Set(patterns), fromCache: false, attempts };
        }

        // ── FAILED ──────────────────────────────────────────────────────────
        console.error(`Failed to generate exclude patterns after ${this.retries} attempt(s).`);
        return { status: 'failed', lastError, attempts };
    }

    /** Returns an error message when generation cannot start, undefined otherwise. */
    private configure(): string | undefined {
        if (!this.model.trim()) return 'no model identifier configured';
        if (!Number.isInteger(this.retries) || this.retries < 1) {
            return `retry budget must be a positive integer, got ${this.retries}`;
        }
        try {
            this.backend.configure();
        } catch (error) {
            return error instanceof Error ? error.message : String(error);
        }
        return undefined;
    }
}
