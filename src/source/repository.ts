/**
 * Source resolution - turns the `source` argument into a local directory.
 *
 * Remote repositories (and local repositories checked out at another branch) are
 * shallow-cloned into a temporary directory that is removed on every exit path.
 */

import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';
import { mkdtemp, rm } from 'fs/promises';
import { existsSync, rmSync } from 'fs';
import { basename, join, resolve } from 'path';
import { tmpdir } from 'os';

const execFile = promisify(execFileCb);

const REPOSITORY_PREFIXES = ['http://', 'https://', 'git@'];
const TEMP_PREFIX = 'ingestprep-clone-';

export class SourceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SourceError';
    }
}

/** Runs git with the given arguments; rejects when git exits non-zero. */
export type GitRunner = (args: string[]) => Promise<void>;

export interface ResolvedSource {
    /** Absolute local path to analyse and ingest */
    path: string;
    /** True when the path is a scoped clone that will be removed afterwards */
    cloned: boolean;
}

const runGit: GitRunner = async (args) => {
    await execFile('git', args);
};

export function isRepositoryUrl(source: string): boolean {
    return REPOSITORY_PREFIXES.some(prefix => source.startsWith(prefix));
}

/**
 * Repository or folder name of a source, without a trailing .git.
 */
export function sourceName(source: string): string {
    if (!isRepositoryUrl(source)) {
        return basename(resolve(source));
    }
    // git@host:owner/repo.git → owner/repo.git
    const path = source.startsWith('git@') ? source.slice(source.indexOf(':') + 1) : source;
    const name = basename(path.replace(/\/+$/, ''));
    return name.endsWith('.git') ? name.slice(0, -4) : name;
}

/**
 * Default digest file name: digest-<name>.txt
 */
export function defaultOutputName(source: string): string {
    return `digest-${sourceName(source)}.txt`;
}

/**
 * Remove a directory from a signal handler. A failure is logged so the handler
 * still reaches its exit code.
 */
export function removeDirectorySync(dir: string): boolean {
    try {
        rmSync(dir, { recursive: true, force: true, maxRetries: 3 });
        return true;
    } catch (error) {
        console.error(`Could not remove temporary directory ${dir}: ${error instanceof Error ? error.message : error}`);
        return false;
    }
}

/**
 * Run fn with a fresh temporary directory and remove it afterwards, whether fn
 * resolves, throws, or the process is interrupted.
 */
export async function withTempDirectory<T>(fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await mkdtemp(join(tmpdir(), TEMP_PREFIX));

    const onSignal = (signal: NodeJS.Signals): void => {
        removeDirectorySync(dir);
        process.exit(signal === 'SIGINT' ? 130 : 143);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
        return await fn(dir);
    } finally {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
        await rm(dir, { recursive: true, force: true });
    }
}

/**
 * Shallow-clone a repository into targetDir.
 */
export async function cloneRepository(
    url: string,
    targetDir: string,
    branch?: string,
    git: GitRunner = runGit
): Promise<void> {
    console.log(`Cloning '${url}'${branch ? ` (branch: ${branch})` : ''}...`);

    const args = ['clone', '--depth', '1', '--quiet'];
    if (branch) args.push('--branch', branch);
    args.push(url, targetDir);

    try {
        await git(args);
    } catch (error) {
        throw new SourceError(`Failed to clone '${url}': ${describeGitError(error)}`);
    }
    console.log('Cloning successful.');
}

/**
 * Resolve source to a local directory and run fn with it. Clones are scoped to fn.
 */
export async function withResolvedSource<T>(
    source: string,
    branch: string | undefined,
    fn: (resolved: ResolvedSource) => Promise<T>,
    git: GitRunner = runGit
): Promise<T> {
    if (isRepositoryUrl(source)) {
        return withTempDirectory(async (dir) => {
            // Clone into a named subdirectory so the tree is rooted at the repository name
            const target = join(dir, sourceName(source) || 'repository');
            await cloneRepository(source, target, branch, git);
            return fn({ path: target, cloned: true });
        });
    }

    const localPath = resolve(source);
    if (!existsSync(localPath)) {
        throw new SourceError(`Local source path does not exist: ${localPath}`);
    }

    if (branch) {
        return withTempDirectory(async (dir) => {
            const target = join(dir, basename(localPath));
            await cloneRepository(localPath, target, branch, git);
            return fn({ path: target, cloned: true });
        });
    }

    return fn({ path: localPath, cloned: false });
}

function describeGitError(error: unknown): string {
    if (typeof error === 'object' && error !== null) {
        if ('code' in error && error.code === 'ENOENT') {
            return "'git' command not found. Make sure Git is installed and on your PATH.";
        }
        if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
            return error.stderr.trim();
        }
    }
    return error instanceof Error ? error.message : String(error);
}
