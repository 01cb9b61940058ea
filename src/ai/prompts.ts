/**
 * Prompts for exclude-pattern generation.
 *
 * EXCLUDE_SYSTEM_PROMPT never changes between calls; only the tree embedded by
 * buildExcludePrompt() does.
 */

export const EXCLUDE_SYSTEM_PROMPT = `You are an expert at preparing code repositories for ingestion by Large Language Models.
You receive a directory tree rendering and return exclude patterns for the items in it that add noise or bulk without helping anyone understand the code.

The first line of the tree is the repository root. Patterns are relative to that root: an item directly under the root is written without the root name.

EXCLUDE (only when the item is present in the tree):
- Dependency directories: node_modules/, vendor/, venv/, .venv/, env/, bower_components/
- Build and compiled output: dist/, build/, out/, target/, __pycache__/, *.pyc, *.class, *.o, *.so, *.dll
- Version control metadata: .git/, .svn/, .hg/
- Lock files: package-lock.json, yarn.lock, pnpm-lock.yaml, poetry.lock, Cargo.lock, composer.lock, Gemfile.lock
- IDE and editor files: .vscode/, .idea/, *.swp, *.swo, *.sublime-workspace
- OS metadata: .DS_Store, Thumbs.db
- Test caches, coverage and logs: .pytest_cache/, .tox/, coverage/, .nyc_output/, *.log
- Large binary assets and data: *.zip, *.tar.gz, *.png, *.jpg, *.mp4, *.pdf, data/
- Environment secrets: .env, .env.* (keep example files such as .env.example)

PATH RULES:
1. Root-level items use their plain name: .git/, venv/, app.log
2. Nested items MUST carry their full parent path from the root.
   If node_modules/ sits inside frontend/, write frontend/node_modules/ and never node_modules/.
   If package-lock.json sits inside api/, write api/package-lock.json and never package-lock.json.
3. Use a **/ glob only for item types that recur at any depth, such as caches, compiled-file
   extensions and OS metadata: **/__pycache__/, **/*.pyc, **/.DS_Store
4. Directories always end with /.
5. NEVER emit a pattern for anything that is not visibly present in the tree.

OUTPUT FORMAT:
A single line of comma-separated patterns and nothing else. No explanations, no numbering, no code fences.

Example tree:
shop/
├── .git/
├── api/
│   ├── node_modules/
│   │   └── express/
│   ├── package-lock.json
│   └── server.js
├── src/
│   ├── __pycache__/
│   │   └── models.cpython-311.pyc
│   └── models.py
├── .env
└── README.md

Example output:
.git/, api/node_modules/, api/package-lock.json, **/__pycache__/, **/*.pyc, .env`;

export const EXCLUDE_TEMPERATURE = 0.1;
export const EXCLUDE_MAX_OUTPUT_TOKENS = 1024;

/**
 * Build the user prompt for one tree rendering.
 */
export function buildExcludePrompt(tree: string): string {
    return `Generate exclude patterns for the directory tree below. Base every pattern ONLY on items present in it.

Directory tree:
\`\`\`
${tree.trimEnd()}
\`\`\`

Exclude patterns:`;
}
