#!/usr/bin/env node

/**
 * ingestprep CLI
 *
 * Prepare a local directory or remote repository for digest ingestion, with exclude
 * patterns inferred from its directory tree.
 */

import { Command, InvalidArgumentError } from 'commander';
import { createRequire } from 'module';
import { IngestApp } from './app.js';
import { loadConfigFile, resolveRunConfig, DEFAULT_MAX_FILE_SIZE, type CliOverrides, type FileConfig } from './config.js';
import { DEFAULT_MAX_DEPTH } from './context/tree.js';
import { DEFAULT_RETRIES } from './ai/pattern-generator.js';
import { DEFAULT_GEMINI_MODEL } from './ai/gemini.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

interface CliOptions {
    output?: string;
    maxSize: number;
    excludePattern: string[];
    includePattern: string[];
    branch?: string;
    apiKey?: string;
    geminiModel?: string;
    autoExclude: boolean;
    maxDepth: number;
    dryRun?: boolean;
    showTree?: boolean;
    retries: number;
    cache: boolean;
    configPath?: string;
    verbose?: boolean;
}

function parseInteger(min: number): (value: string) => number {
    return (value) => {
        const parsed = Number(value);
        if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
            throw new InvalidArgumentError(`Expected an integer, got '${value}'.`);
        }
        if (parsed < min) {
            throw new InvalidArgumentError(`Must be at least ${min}, got ${parsed}.`);
        }
        return parsed;
    };
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/** Only flags the user actually typed override the config file and environment. */
function explicitOverrides(options: CliOptions, command: Command): CliOverrides {
    const fromCli = (key: string): boolean => command.getOptionValueSource(key) === 'cli';

    return {
        apiKey: fromCli('apiKey') ? options.apiKey : undefined,
        model: fromCli('geminiModel') ? options.geminiModel : undefined,
        maxDepth: fromCli('maxDepth') ? options.maxDepth : undefined,
        retries: fromCli('retries') ? options.retries : undefined,
        maxSize: fromCli('maxSize') ? options.maxSize : undefined,
        exclude: options.excludePattern,
        include: options.includePattern,
        autoExclude: fromCli('autoExclude') ? options.autoExclude : undefined,
        cache: fromCli('cache') ? options.cache : undefined,
        verbose: fromCli('verbose') ? options.verbose : undefined,
    };
}

const program = new Command();

program
    .name('ingestprep')
    .description('Digest a directory or repository, excluding noise found by an AI-generated pattern list')
    .version(version)
    .argument('<source>', 'Local directory/file path or repository URL (http://, https://, git@)')
    .option('-o, --output <file>', 'Output file path (default: digest-<name>.txt)')
    .option('-s, --max-size <bytes>', 'Skip files larger than this many bytes', parseInteger(1), DEFAULT_MAX_FILE_SIZE)
    .option('-e, --exclude-pattern <pattern>', 'Exclude pattern (repeatable)', collect, [])
    .option('-i, --include-pattern <pattern>', 'Include pattern, overrides excludes (repeatable)', collect, [])
    .option('-b, --branch <name>', 'Branch to clone and ingest')
    .option('--api-key <key>', 'Gemini API key (default: GEMINI_API_KEY from environment or .env)')
    .option('--gemini-model <model>', `Gemini model (default: GEMINI_MODEL or ${DEFAULT_GEMINI_MODEL})`)
    .option('--no-auto-exclude', 'Do not generate exclude patterns automatically')
    .option('--max-depth <n>', 'Depth limit of the tree sent for pattern generation', parseInteger(0), DEFAULT_MAX_DEPTH)
    .option('--dry-run', 'Print the final patterns and skip ingestion')
    .option('--show-tree', 'Print the directory tree used for pattern generation')
    .option('--retries <n>', 'Pattern generation attempts', parseInteger(1), DEFAULT_RETRIES)
    .option('--no-cache', 'Bypass the pattern cache')
    .option('--config-path <path>', 'Path to a JSON config file')
    .option('--verbose', 'Verbose output')
    .action(async (source: string, options: CliOptions, command: Command) => {
        try {
            const fileConfig: FileConfig = options.configPath ? loadConfigFile(options.configPath) : {};
            const { config, warnings } = resolveRunConfig(explicitOverrides(options, command), fileConfig);
            for (const warning of warnings) console.warn(`Warning: ${warning}`);

            if (config.verbose) {
                console.log(`Model: ${config.model}`);
                if (config.apiKeySource) console.log(`API key from: ${config.apiKeySource}`);
                console.log(`Max depth: ${config.maxDepth}, retries: ${config.retries}, max file size: ${config.maxFileSize}`);
            }

            const app = new IngestApp(config);
            await app.run({
                source,
                output: options.output,
                branch: options.branch,
                dryRun: options.dryRun,
                showTree: options.showTree,
            });
        } catch (error) {
            console.error(`Error: ${error instanceof Error ? error.message : error}`);
            process.exit(1);
        }
    });

await program.parseAsync(process.argv);
