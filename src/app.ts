/**
 * Ingest App - Runs one ingestion: resolve the source, infer exclude patterns from its
 * tree, merge them with the user's patterns and hand everything to the ingestor.
 */

import { statSync } from 'fs';
import { resolve } from 'path';
import { renderTree } from './context/tree.js';
import { GeminiBackend } from './ai/gemini.js';
import { PatternCache } from './ai/cache.js';
import { PatternGenerator, type GenerationOutcome } from './ai/pattern-generator.js';
import { defaultOutputName, withResolvedSource, type GitRunner } from './source/repository.js';
import { FileDigestIngestor, type Ingestor, type IngestSummary } from './ingest/digest.js';
import type { RunConfig } from './config.js';

export { FileDigestIngestor } from './ingest/digest.js';
export type { Ingestor, IngestParams, IngestSummary } from './ingest/digest.js';
export { resolveRunConfig, loadConfigFile, type RunConfig } from './config.js';

// ── Types ───────────────────────────────────────────────────────────────────

export interface RunRequest {
    /** Local path or repository URL */
    source: string;
    /** Digest destination; defaults to digest-<name>.txt in the working directory */
    output?: string;
    branch?: string;
    /** Print the final patterns and stop before ingestion */
    dryRun?: boolean;
    /** Print the tree rendering before generation */
    showTree?: boolean;
}

export type RunResult =
    | {
        status: 'dry-run';
        excludePatterns: Set<string>;
        includePatterns: Set<string>;
        generation?: GenerationOutcome;
    }
    | {
        status: 'ingested';
        excludePatterns: Set<string>;
        includePatterns: Set<string>;
        generation?: GenerationOutcome;
        result: IngestSummary;
    };

/** Anything that turns a tree rendering into exclude patterns. */
export interface PatternSource {
    generate(tree: string): Promise<GenerationOutcome>;
}

export interface IngestAppDeps {
    ingestor?: Ingestor;
    createGenerator?: (config: RunConfig) => PatternSource;
    git?: GitRunner;
}

export function createDefaultGenerator(config: RunConfig): PatternSource {
    const backend = new GeminiBackend({
        apiKey: config.apiKey ?? '',
        model: config.model,
        timeoutMs: config.timeoutMs,
        verbose: config.verbose,
    });
    const cache = config.cache.enabled
        ? new PatternCache({
            ttlDays: config.cache.ttlDays,
            maxEntries: config.cache.maxEntries,
            verbose: config.verbose,
        })
        : undefined;

    return new PatternGenerator({
        backend,
        model: config.model,
        retries: config.retries,
        cache,
        verbose: config.verbose,
    });
}

function printPatterns(title: string, patterns: Set<string>): void {
    console.log(title);
    if (patterns.size === 0) {
        console.log('  (None)');
        return;
    }
    for (const pattern of [...patterns].sort()) {
        console.log(`  - ${pattern}`);
    }
}

// ── IngestApp ───────────────────────────────────────────────────────────────

export class IngestApp {
    private readonly ingestor: Ingestor;
    private readonly createGenerator: (config: RunConfig) => PatternSource;
    private readonly git?: GitRunner;

    constructor(private readonly config: RunConfig, deps: IngestAppDeps = {}) {
        this.ingestor = deps.ingestor ?? new FileDigestIngestor(config.verbose);
        this.createGenerator = deps.createGenerator ?? createDefaultGenerator;
        this.git = deps.git;
    }

    async run(request: RunRequest): Promise<RunResult> {
        return withResolvedSource(request.source, request.branch, async ({ path }) => {
            const excludePatterns = new Set(this.config.excludePatterns);
            const includePatterns = new Set(this.config.includePatterns);

            const generation = await this.generatePatterns(path, request.showTree ?? false);
            if (generation?.status === 'succeeded') {
                printPatterns('Generated exclude patterns:', generation.patterns);
                for (const pattern of generation.patterns) excludePatterns.add(pattern);
            }

            if (request.dryRun) {
                printPatterns('Final Exclude Patterns (Dry Run):', excludePatterns);
                if (includePatterns.size > 0) printPatterns('Include Patterns:', includePatterns);
                return { status: 'dry-run', excludePatterns, includePatterns, generation };
            }

            const outputPath = resolve(request.output ?? defaultOutputName(request.source));
            printPatterns('Final Exclude Patterns:', excludePatterns);
            if (includePatterns.size > 0) printPatterns('Include Patterns:', includePatterns);

            console.log(`Ingesting '${request.source}' into '${outputPath}'...`);
            const result = await this.ingestor.ingest({
                sourcePath: path,
                outputPath,
                maxFileSize: this.config.maxFileSize,
                includePatterns: includePatterns.size > 0 ? includePatterns : undefined,
                excludePatterns: excludePatterns.size > 0 ? excludePatterns : undefined,
            });

            console.log(result.summary);
            console.log(`Digest written to ${result.outputPath}`);
            return { status: 'ingested', excludePatterns, includePatterns, generation, result };
        }, this.git);
    }

    /**
     * Render the tree and, when auto-exclusion applies to this source, ask for patterns.
     */
    private async generatePatterns(path: string, showTree: boolean): Promise<GenerationOutcome | undefined> {
        const enabled = this.config.autoExclude && Boolean(this.config.apiKey);
        const isDirectory = statSync(path).isDirectory();

        if (enabled && !isDirectory) {
            console.warn('Warning: automatic exclusion needs a directory source; skipping it.');
        } else if (!enabled && this.config.verbose) {
            console.log('Automatic exclusion is off.');
        }
        if (!isDirectory || (!enabled && !showTree)) return undefined;

        console.log('Generating directory tree...');
        const tree = renderTree(path, { maxDepth: this.config.maxDepth });

        if (showTree) {
            console.log('--- Directory Tree ---');
            console.log(tree.trimEnd());
            console.log('--- End Directory Tree ---');
        }
        if (!enabled) return undefined;

        const outcome = await this.createGenerator(this.config).generate(tree);
        if (outcome.status !== 'succeeded') {
            console.warn('Warning: continuing without automatically generated exclude patterns.');
        }
        return outcome;
    }
}
