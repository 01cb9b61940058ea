/**
 * Directory Tree Renderer - Creates the tree rendering the pattern generator sees.
 *
 * Output is deterministic for an unchanged filesystem: siblings are ordered by a
 * case-sensitive code-unit comparison, never by locale.
 */

import { readdirSync, statSync } from 'fs';
import { join, basename, resolve } from 'path';

export const DEFAULT_MAX_DEPTH = 8;

const CORNER = '└── ';
const TEE = '├── ';
const LAST_INDENT = '    ';
const BRANCH_INDENT = '│   ';

export interface TreeOptions {
  /** Deepest level rendered; nodes below it collapse into a placeholder (default: 8) */
  maxDepth?: number;
  /** List directories before files at each level (default: false - interleaved by name) */
  directoriesFirst?: boolean;
  /** Hide entries for which this returns false. Paths are relative to the root, '/'-separated. */
  include?: (relativePath: string, isDirectory: boolean) => boolean;
}

interface WalkContext {
  maxDepth: number;
  directoriesFirst: boolean;
  include?: TreeOptions['include'];
}

interface ChildEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Render the subtree at rootPath. Every line ends with a newline.
 */
export function renderTree(rootPath: string, options: TreeOptions = {}): string {
  const ctx: WalkContext = {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    directoriesFirst: options.directoriesFirst ?? false,
    include: options.include,
  };

  let out = '';
  for (const line of walk(resolve(rootPath), '', 0, '', true, ctx)) {
    out += `${line}\n`;
  }
  return out;
}

function* walk(
  path: string,
  relPath: string,
  depth: number,
  prefix: string,
  isLast: boolean,
  ctx: WalkContext
): Generator<string> {
  if (depth > ctx.maxDepth) {
    yield `${prefix}${CORNER}[Max depth reached]`;
    return;
  }

  const name = basename(path);
  let isDirectory: boolean;
  try {
    isDirectory = statSync(path).isDirectory();
  } catch {
    yield `${prefix}${CORNER}[Path not found: ${name}]`;
    return;
  }

  const label = isDirectory ? `${name}/` : name;
  if (depth === 0) {
    yield label;
  } else {
    yield `${prefix}${isLast ? CORNER : TEE}${label}`;
  }

  if (!isDirectory) return;

  const childPrefix = depth === 0 ? '' : `${prefix}${isLast ? LAST_INDENT : BRANCH_INDENT}`;

  let names: string[];
  try {
    names = readdirSync(path);
  } catch (error) {
    yield `${childPrefix}${CORNER}${describeListingError(error)}`;
    return;
  }

  const children = orderChildren(path, names, ctx.directoriesFirst).filter(child =>
    ctx.include ? ctx.include(joinRelative(relPath, child.name), child.isDirectory) : true
  );

  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    yield* walk(
      join(path, child.name),
      joinRelative(relPath, child.name),
      depth + 1,
      childPrefix,
      i === children.length - 1,
      ctx
    );
  }
}

function orderChildren(dirPath: string, names: string[], directoriesFirst: boolean): ChildEntry[] {
  const entries = names.map(name => ({ name, isDirectory: isDirectorySafe(join(dirPath, name)) }));
  return entries.sort((a, b) => {
    if (directoriesFirst && a.isDirectory !== b.isDirectory) {
      return a.isDirectory ? -1 : 1;
    }
    return compareNames(a.name, b.name);
  });
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isDirectorySafe(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describeListingError(error: unknown): string {
  const code = errorCode(error);
  if (code === 'EACCES' || code === 'EPERM') {
    return '[Permission denied]';
  }
  return `[Error listing: ${error instanceof Error ? error.message : String(error)}]`;
}
