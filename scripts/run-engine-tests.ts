/* Simple engine test runner
 * - Discovers *.spec.ts under test/engine
 * - Imports default export or named `cases` array of TestCase
 * - Runs with the harness and prints a summary; exits non-zero on failures
 */

import { readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { TestCase } from '../test/engine/harness.ts';
import { runAll } from '../test/engine/harness.ts';

function* walk(dir: string): Generator<string> {
  for (const name of readdirSync(dir).sort()) {
    const p = join(dir, name);
    const st = statSync(p);
    if (st.isDirectory()) yield* walk(p);
    else if (name.endsWith('.spec.ts')) yield p;
  }
}

function isCaseList(x: unknown): x is TestCase[] {
  return Array.isArray(x) && x.every(c => typeof c === 'object' && c !== null && 'name' in c && 'pre' in c && 'actions' in c);
}

async function loadCasesFrom(file: string): Promise<TestCase[]> {
  const mod: Record<string, unknown> = await import(pathToFileURL(file).href);
  const arr = mod.default ?? mod.cases;
  if (!isCaseList(arr)) {
    console.warn(`Skipping ${file}: no TestCase[] export`);
    return [];
  }
  return arr;
}

async function main() {
  const root = join(process.cwd(), 'test', 'engine');
  const files = Array.from(walk(root));
  let all: TestCase[] = [];
  for (const f of files) {
    const cs = await loadCasesFrom(f);
    all = all.concat(cs);
  }
  if (all.length === 0) {
    console.log('No engine test cases found.');
    return;
  }
  const { results, failed } = await runAll(all);
  for (const r of results) {
    if (r.ok) console.log(`✔ ${r.name}`);
    else {
      console.log(`✖ ${r.name}`);
      for (const e of r.errors) console.log('  - ' + e);
    }
  }
  console.log(`\n${results.length} test(s), ${failed} failed.`);
  if (failed > 0) process.exitCode = 1;
}

main().catch(e => {
  console.error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exitCode = 1;
});
