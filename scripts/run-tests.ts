import { spawnSync } from 'node:child_process';
import { existsSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

/** Suffixes that put a test file in a named category of its own. */
const TAGGED = {
  integration: '.integration.test.ts',
  acceptance: '.acceptance.test.ts'
} as const;

type Category = 'unit' | keyof typeof TAGGED;

/**
 * Decide whether a test file belongs to a category. Unit tests are every
 * `*.test.ts` without an integration or acceptance tag.
 */
const selectors: Record<Category, (name: string) => boolean> = {
  unit: (name) =>
    name.endsWith('.test.ts') && !Object.values(TAGGED).some((suffix) => name.endsWith(suffix)),
  integration: (name) => name.endsWith(TAGGED.integration),
  acceptance: (name) => name.endsWith(TAGGED.acceptance)
};

function isCategory(value: string | undefined): value is Category {
  return value !== undefined && Object.hasOwn(selectors, value);
}

function collect(dir: string, matches: (name: string) => boolean, out: string[]): void {
  if (!existsSync(dir)) return;
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) collect(fullPath, matches, out);
    else if (entry.isFile() && matches(entry.name)) out.push(fullPath);
  }
}

const category = process.argv[2];
if (!isCategory(category)) {
  console.error(`Usage: tsx scripts/run-tests.ts <${Object.keys(selectors).join('|')}>`);
  process.exit(1);
}

const files: string[] = [];
for (const root of ['src', 'server']) collect(resolve(root), selectors[category], files);
if (files.length === 0) {
  console.error(`No ${category} tests found.`);
  process.exit(1);
}

const vitest = resolve('node_modules', '.bin', process.platform === 'win32' ? 'vitest.cmd' : 'vitest');
const run = spawnSync(vitest, ['run', ...files], { stdio: 'inherit' });
if (run.error) {
  console.error(run.error.message);
  process.exit(1);
}
process.exit(run.status ?? 1);
