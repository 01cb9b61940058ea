import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync, rmSync } from 'fs';
import { basename, join, resolve } from 'path';
import { tmpdir } from 'os';
import { IngestApp, type PatternSource } from '../../src/app.js';
import type { RunConfig } from '../../src/config.js';
import type { IngestParams, IngestSummary } from '../../src/ingest/digest.js';
import { PatternGenerator, type GenerationOutcome } from '../../src/ai/pattern-generator.js';
import type { GenerationRequest } from '../../src/ai/backend.js';
import { renderTree } from '../../src/context/tree.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

function makeConfig(overrides: Partial<RunConfig> = {}): RunConfig {
    return {
        apiKey: 'test-key',
        apiKeySource: '--api-key',
        model: 'test-model',
        maxDepth: 8,
        retries: 3,
        maxFileSize: 4096,
        excludePatterns: new Set(['*.log']),
        includePatterns: new Set(),
        autoExclude: true,
        cache: { enabled: false },
        timeoutMs: 1000,
        verbose: false,
        ...overrides,
    };
}

function fakeIngestor() {
    return {
        ingest: vi.fn(async (params: IngestParams): Promise<IngestSummary> => ({
            summary: 'Files analyzed: 0',
            fileCount: 0,
            skipped: [],
            outputPath: params.outputPath,
        })),
    };
}

function fakeGenerator(outcome: GenerationOutcome) {
    const source = { generate: vi.fn(async (_tree: string) => outcome) };
    const createGenerator = vi.fn((_config: RunConfig): PatternSource => source);
    return { source, createGenerator };
}

const SUCCEEDED: GenerationOutcome = {
    status: 'succeeded',
    patterns: new Set(['node_modules/', '.git/']),
    fromCache: false,
    attempts: [],
};

// ── Tests ───────────────────────────────────────────────────────────────────

describe('IngestApp', () => {
    let workDir: string;
    let project: string;
    function logged(): unknown[] {
        return vi.mocked(console.log).mock.calls.map(call => call[0]);
    }

    beforeEach(() => {
        workDir = mkdtempSync(join(tmpdir(), 'ingestprep-app-test-'));
        project = join(workDir, 'project');
        mkdirSync(join(project, 'src'), { recursive: true });
        writeFileSync(join(project, 'src', 'main.ts'), 'export {};\n');
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        rmSync(workDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('prints the merged patterns on a dry run and never ingests', async () => {
        const ingestor = fakeIngestor();
        const { source, createGenerator } = fakeGenerator(SUCCEEDED);
        const app = new IngestApp(makeConfig(), { ingestor, createGenerator });

        const result = await app.run({ source: project, dryRun: true });

        expect(result.status).toBe('dry-run');
        expect(result.excludePatterns).toEqual(new Set(['*.log', 'node_modules/', '.git/']));
        expect(ingestor.ingest).not.toHaveBeenCalled();
        expect(source.generate).toHaveBeenCalledWith(renderTree(project, { maxDepth: 8 }));

        const lines = logged();
        const start = lines.indexOf('Final Exclude Patterns (Dry Run):');
        expect(lines.slice(start, start + 4)).toEqual([
            'Final Exclude Patterns (Dry Run):',
            '  - *.log',
            '  - .git/',
            '  - node_modules/',
        ]);
    });

    it('prints (None) for an empty dry-run set', async () => {
        const app = new IngestApp(makeConfig({ autoExclude: false, excludePatterns: new Set() }), {
            ingestor: fakeIngestor(),
        });
        await app.run({ source: project, dryRun: true });

        const lines = logged();
        const start = lines.indexOf('Final Exclude Patterns (Dry Run):');
        expect(lines[start + 1]).toBe('  (None)');
    });

    it('hands the merged set to the ingestor', async () => {
        const ingestor = fakeIngestor();
        const { createGenerator } = fakeGenerator(SUCCEEDED);
        const app = new IngestApp(makeConfig(), { ingestor, createGenerator });

        const result = await app.run({ source: project, output: join(workDir, 'out.txt') });

        expect(result.status).toBe('ingested');
        expect(ingestor.ingest).toHaveBeenCalledWith({
            sourcePath: project,
            outputPath: join(workDir, 'out.txt'),
            maxFileSize: 4096,
            includePatterns: undefined,
            excludePatterns: new Set(['*.log', 'node_modules/', '.git/']),
        });
    });

    it('defaults the output to digest-<name>.txt in the working directory', async () => {
        const ingestor = fakeIngestor();
        const app = new IngestApp(makeConfig({ autoExclude: false }), { ingestor });

        await app.run({ source: project });

        expect(ingestor.ingest.mock.calls[0][0].outputPath).toBe(resolve('digest-project.txt'));
    });

    it('passes empty pattern sets as undefined', async () => {
        const ingestor = fakeIngestor();
        const app = new IngestApp(makeConfig({ autoExclude: false, excludePatterns: new Set() }), { ingestor });

        await app.run({ source: project, output: join(workDir, 'out.txt') });

        const params = ingestor.ingest.mock.calls[0][0];
        expect(params.excludePatterns).toBeUndefined();
        expect(params.includePatterns).toBeUndefined();
    });

    it('passes include patterns through', async () => {
        const ingestor = fakeIngestor();
        const app = new IngestApp(makeConfig({ autoExclude: false, includePatterns: new Set(['src/']) }), { ingestor });

        await app.run({ source: project, output: join(workDir, 'out.txt') });

        expect(ingestor.ingest.mock.calls[0][0].includePatterns).toEqual(new Set(['src/']));
    });

    it('skips generation when auto-exclusion is off', async () => {
        const { createGenerator } = fakeGenerator(SUCCEEDED);
        const app = new IngestApp(makeConfig({ autoExclude: false }), { ingestor: fakeIngestor(), createGenerator });

        const result = await app.run({ source: project, dryRun: true });

        expect(createGenerator).not.toHaveBeenCalled();
        expect(result.excludePatterns).toEqual(new Set(['*.log']));
    });

    it('skips generation without a credential', async () => {
        const { createGenerator } = fakeGenerator(SUCCEEDED);
        const app = new IngestApp(makeConfig({ apiKey: undefined }), { ingestor: fakeIngestor(), createGenerator });

        await app.run({ source: project, dryRun: true });

        expect(createGenerator).not.toHaveBeenCalled();
    });

    it('warns and skips generation for a file source', async () => {
        const { createGenerator } = fakeGenerator(SUCCEEDED);
        const app = new IngestApp(makeConfig(), { ingestor: fakeIngestor(), createGenerator });

        await app.run({ source: join(project, 'src', 'main.ts'), dryRun: true });

        expect(createGenerator).not.toHaveBeenCalled();
        expect(console.warn).toHaveBeenCalledWith('Warning: automatic exclusion needs a directory source; skipping it.');
    });

    it('continues with manual patterns when generation fails', async () => {
        const ingestor = fakeIngestor();
        const { createGenerator } = fakeGenerator({ status: 'failed', lastError: 'down', attempts: [] });
        const app = new IngestApp(makeConfig(), { ingestor, createGenerator });

        const result = await app.run({ source: project, output: join(workDir, 'out.txt') });

        expect(result.excludePatterns).toEqual(new Set(['*.log']));
        expect(result.generation?.status).toBe('failed');
        expect(ingestor.ingest).toHaveBeenCalledTimes(1);
        expect(console.warn).toHaveBeenCalledWith('Warning: continuing without automatically generated exclude patterns.');
    });

    it('prints the tree when asked, even with auto-exclusion off', async () => {
        const app = new IngestApp(makeConfig({ autoExclude: false }), { ingestor: fakeIngestor() });

        await app.run({ source: project, dryRun: true, showTree: true });

        const lines = logged();
        const start = lines.indexOf('--- Directory Tree ---');
        expect(lines.slice(start, start + 3)).toEqual([
            '--- Directory Tree ---',
            'project/\n└── src/\n    └── main.ts',
            '--- End Directory Tree ---',
        ]);
    });

    it('ingests a cloned repository and names the digest after it', async () => {
        const ingestor = fakeIngestor();
        const git = vi.fn(async (args: string[]) => {
            const target = args[args.length - 1];
            mkdirSync(target, { recursive: true });
            writeFileSync(join(target, 'index.ts'), '');
        });
        const app = new IngestApp(makeConfig({ autoExclude: false }), { ingestor, git });

        await app.run({ source: 'https://example.com/owner/widget.git' });

        const params = ingestor.ingest.mock.calls[0][0];
        expect(basename(params.sourcePath)).toBe('widget');
        expect(params.outputPath).toBe(resolve('digest-widget.txt'));
        expect(git).toHaveBeenCalledTimes(1);
    });

    it('propagates ingestion errors', async () => {
        const ingestor = { ingest: vi.fn(async (): Promise<IngestSummary> => { throw new Error('disk full'); }) };
        const app = new IngestApp(makeConfig({ autoExclude: false }), { ingestor });

        await expect(app.run({ source: project, output: join(workDir, 'out.txt') })).rejects.toThrow('disk full');
    });

    it('unions a quoted single-line reply into the exclude set end to end', async () => {
        mkdirSync(join(project, '.git'));
        mkdirSync(join(project, 'src', '__pycache__'));
        writeFileSync(join(project, 'src', '__pycache__', 'util.cache'), '');
        mkdirSync(join(project, 'node_modules', 'pkg'), { recursive: true });

        const prompts: string[] = [];
        const backend = {
            name: 'Scripted',
            configure: () => {},
            generate: async (request: GenerationRequest) => {
                prompts.push(request.prompt);
                return '".git/, node_modules/, **/__pycache__/"';
            },
        };
        const app = new IngestApp(makeConfig({ excludePatterns: new Set() }), {
            ingestor: fakeIngestor(),
            createGenerator: (config) => new PatternGenerator({ backend, model: config.model, retries: config.retries }),
        });

        const result = await app.run({ source: project, dryRun: true });

        expect(result.excludePatterns).toEqual(new Set(['.git/', 'node_modules/', '**/__pycache__/']));
        expect(prompts).toHaveLength(1);
        expect(prompts[0]).toContain('└── src/\n    ├── __pycache__/\n    │   └── util.cache\n    └── main.ts');
    });
});
