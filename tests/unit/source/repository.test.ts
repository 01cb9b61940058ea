import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync, rmSync, existsSync, readFileSync } from 'fs';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import {
    isRepositoryUrl,
    defaultOutputName,
    cloneRepository,
    withResolvedSource,
    withTempDirectory,
    removeDirectorySync,
    SourceError,
    type GitRunner,
} from '../../../src/source/repository.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

// rmSync records its calls and throws the queued errors first
const removal = vi.hoisted(() => {
    const errors: Error[] = [];
    const calls: unknown[][] = [];
    return { errors, calls };
});

vi.mock('fs', async (importOriginal) => {
    const actual = await importOriginal<typeof import('fs')>();
    return {
        ...actual,
        rmSync: (...args: Parameters<typeof actual.rmSync>) => {
            removal.calls.push(args);
            const error = removal.errors.shift();
            if (error) throw error;
            actual.rmSync(...args);
        },
    };
});

/** process.exit replacement that surfaces the exit code instead of leaving. */
function trapExit() {
    return vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${code}`);
    });
}

/** Stand-in for git clone: creates the target directory with one file. */
function fakeGit(): Mock<GitRunner> {
    return vi.fn(async (args: string[]) => {
        const target = args[args.length - 1];
        mkdirSync(target, { recursive: true });
        writeFileSync(join(target, 'README.md'), `cloned from ${args[args.length - 2]}`);
    });
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('isRepositoryUrl', () => {
    it('recognises http, https and ssh forms', () => {
        expect(isRepositoryUrl('https://example.com/owner/repo.git')).toBe(true);
        expect(isRepositoryUrl('http://example.com/owner/repo')).toBe(true);
        expect(isRepositoryUrl('git@example.com:owner/repo.git')).toBe(true);
    });

    it('treats everything else as a local path', () => {
        expect(isRepositoryUrl('./repo')).toBe(false);
        expect(isRepositoryUrl('/srv/repo')).toBe(false);
        expect(isRepositoryUrl('ftp://example.com/repo')).toBe(false);
    });
});

describe('defaultOutputName', () => {
    it('uses the repository name without .git', () => {
        expect(defaultOutputName('https://example.com/owner/repo.git')).toBe('digest-repo.txt');
        expect(defaultOutputName('git@example.com:owner/tool.git')).toBe('digest-tool.txt');
        expect(defaultOutputName('https://example.com/owner/site/')).toBe('digest-site.txt');
    });

    it('uses the folder name for local paths', () => {
        expect(defaultOutputName('/srv/projects/widget')).toBe('digest-widget.txt');
    });
});

describe('source resolution', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = mkdtempSync(join(tmpdir(), 'ingestprep-source-test-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        rmSync(workDir, { recursive: true, force: true });
        removal.errors.length = 0;
        removal.calls.length = 0;
        vi.restoreAllMocks();
    });

    describe('cloneRepository', () => {
        it('runs a quiet shallow clone', async () => {
            const git = fakeGit();
            await cloneRepository('https://example.com/o/r.git', join(workDir, 'r'), undefined, git);
            expect(git.mock.calls[0][0]).toEqual([
                'clone', '--depth', '1', '--quiet', 'https://example.com/o/r.git', join(workDir, 'r'),
            ]);
        });

        it('passes the branch', async () => {
            const git = fakeGit();
            await cloneRepository('https://example.com/o/r.git', join(workDir, 'r'), 'dev', git);
            expect(git.mock.calls[0][0]).toEqual([
                'clone', '--depth', '1', '--quiet', '--branch', 'dev', 'https://example.com/o/r.git', join(workDir, 'r'),
            ]);
        });

        it('reports git stderr in a SourceError', async () => {
            const git: GitRunner = async () => {
                throw Object.assign(new Error('Command failed'), { stderr: 'fatal: repository not found\n' });
            };
            const error = await cloneRepository('https://example.com/o/r.git', join(workDir, 'r'), undefined, git)
                .catch((e: unknown) => e);
            expect(error).toBeInstanceOf(SourceError);
            expect(error).toMatchObject({
                message: "Failed to clone 'https://example.com/o/r.git': fatal: repository not found",
            });
        });

        it('explains a missing git binary', async () => {
            const git: GitRunner = async () => {
                throw Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' });
            };
            await expect(cloneRepository('https://example.com/o/r.git', join(workDir, 'r'), undefined, git))
                .rejects.toThrow("'git' command not found");
        });
    });

    describe('withTempDirectory', () => {
        it('removes the directory and its signal handlers afterwards', async () => {
            const before = process.listenerCount('SIGINT');
            let seen = '';
            await withTempDirectory(async (dir) => {
                seen = dir;
                writeFileSync(join(dir, 'file.txt'), 'x');
                expect(process.listenerCount('SIGINT')).toBe(before + 1);
            });
            expect(existsSync(seen)).toBe(false);
            expect(process.listenerCount('SIGINT')).toBe(before);
        });

        it('removes the directory when the callback throws', async () => {
            let seen = '';
            await expect(withTempDirectory(async (dir) => {
                seen = dir;
                throw new Error('boom');
            })).rejects.toThrow('boom');
            expect(existsSync(seen)).toBe(false);
        });

        it('removes the directory and exits with 130 on SIGINT', async () => {
            const exit = trapExit();
            let seen = '';
            await withTempDirectory(async (dir) => {
                seen = dir;
                writeFileSync(join(dir, 'file.txt'), 'x');
                const [onSignal] = process.listeners('SIGINT').slice(-1);
                expect(() => onSignal('SIGINT')).toThrow('exit 130');
                expect(existsSync(dir)).toBe(false);
            });
            expect(exit).toHaveBeenCalledWith(130);
            expect(removal.calls).toContainEqual([seen, { recursive: true, force: true, maxRetries: 3 }]);
        });

        it('still exits with 143 on SIGTERM when the directory cannot be removed', async () => {
            const exit = trapExit();
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            await withTempDirectory(async (dir) => {
                removal.errors.push(new Error('EBUSY: resource busy or locked'));
                const [onSignal] = process.listeners('SIGTERM').slice(-1);
                expect(() => onSignal('SIGTERM')).toThrow('exit 143');
                expect(error).toHaveBeenCalledWith(
                    `Could not remove temporary directory ${dir}: EBUSY: resource busy or locked`
                );
            });
            expect(exit).toHaveBeenCalledWith(143);
        });
    });

    describe('removeDirectorySync', () => {
        it('reports whether the directory was removed', () => {
            const dir = join(workDir, 'scratch');
            mkdirSync(dir);
            expect(removeDirectorySync(dir)).toBe(true);
            expect(existsSync(dir)).toBe(false);

            vi.spyOn(console, 'error').mockImplementation(() => {});
            removal.errors.push(new Error('EPERM: operation not permitted'));
            expect(removeDirectorySync(dir)).toBe(false);
            expect(console.error).toHaveBeenCalledWith(
                `Could not remove temporary directory ${dir}: EPERM: operation not permitted`
            );
        });
    });

    describe('withResolvedSource', () => {
        it('clones a URL into a directory named after the repository', async () => {
            const git = fakeGit();
            let clonedPath = '';
            const content = await withResolvedSource('https://example.com/owner/repo.git', undefined, async (resolved) => {
                clonedPath = resolved.path;
                expect(resolved.cloned).toBe(true);
                return readFileSync(join(resolved.path, 'README.md'), 'utf-8');
            }, git);

            expect(basename(clonedPath)).toBe('repo');
            expect(content).toBe('cloned from https://example.com/owner/repo.git');
            expect(existsSync(clonedPath)).toBe(false);
        });

        it('cleans up the clone when processing fails', async () => {
            let clonedPath = '';
            await expect(withResolvedSource('https://example.com/owner/repo.git', undefined, async (resolved) => {
                clonedPath = resolved.path;
                throw new Error('ingest failed');
            }, fakeGit())).rejects.toThrow('ingest failed');
            expect(clonedPath).not.toBe('');
            expect(existsSync(clonedPath)).toBe(false);
        });

        it('uses an existing local path as-is', async () => {
            const git = fakeGit();
            const resolved = await withResolvedSource(workDir, undefined, async (r) => r, git);
            expect(resolved).toEqual({ path: workDir, cloned: false });
            expect(git).not.toHaveBeenCalled();
        });

        it('rejects a missing local path', async () => {
            const missing = join(workDir, 'missing');
            await expect(withResolvedSource(missing, undefined, async () => 'unused', fakeGit()))
                .rejects.toThrow(`Local source path does not exist: ${missing}`);
        });

        it('clones a local repository when a branch is requested', async () => {
            const local = join(workDir, 'checkout');
            mkdirSync(local);
            const git = fakeGit();

            const name = await withResolvedSource(local, 'release', async (resolved) => {
                expect(resolved.cloned).toBe(true);
                return basename(resolved.path);
            }, git);

            expect(name).toBe('checkout');
            expect(git.mock.calls[0][0]).toEqual(expect.arrayContaining(['--branch', 'release', local]));
        });
    });
});
