// Checks a spell catalog and the core ruleset before they ship.
// Prints every issue and exits non-zero when any of them is an error.

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  CORE_RULES,
  analyzeGlobal,
  analyzeRules,
  getCatalog,
  loadCatalogFile,
  walkEffect,
  type Catalog,
  type Effect,
} from '../index.ts';

type Issue = { level: 'error' | 'warning'; code: string; message: string; where: string };

type CatalogReport = {
  cards: number;
  sets: Record<string, number>;
  effectKinds: string[];
  issues: Issue[];
  ok: boolean;
};

function buildReport(catalog: Catalog): CatalogReport {
  const issues: Issue[] = [];
  for (const i of catalog.issues) {
    issues.push({ level: i.level, code: i.code, message: i.message, where: [i.cardId ?? 'card', ...(i.path ?? [])].join('.') });
  }
  const cards = [...catalog.cards.values()];
  for (const i of analyzeGlobal(cards, CORE_RULES.players.startingHand).issues) {
    issues.push({ level: i.level, code: i.code, message: i.message, where: (i.path ?? ['catalog']).join('.') });
  }
  for (const i of analyzeRules(CORE_RULES).issues) {
    issues.push({ level: i.level, code: i.code, message: i.message, where: ['rules', ...(i.path ?? [])].join('.') });
  }

  const kinds = new Set<Effect['kind']>();
  for (const c of cards) {
    for (const clause of [...c.resolve, ...c.advance]) walkEffect(clause.do, e => kinds.add(e.kind));
  }

  const sets: Record<string, number> = {};
  for (const [name, group] of catalog.sets) sets[name] = group.length;

  return {
    cards: cards.length,
    sets,
    effectKinds: [...kinds].sort(),
    issues,
    ok: issues.every(i => i.level !== 'error'),
  };
}

function printReport(r: CatalogReport) {
  console.log('=== Catalog Report ===');
  console.log(`- Cards: ${r.cards}`);
  console.log(`- Sets:  ${Object.entries(r.sets).map(([n, c]) => `${n} (${c})`).join(', ') || '(none)'}`);
  console.log(`- Effect kinds in use: ${r.effectKinds.join(', ') || '(none)'}`);
  if (r.issues.length) {
    console.log('\n[Issues]');
    for (const i of r.issues) console.log(`- ${i.level.toUpperCase()} ${i.code} at ${i.where}: ${i.message}`);
  } else {
    console.log('\nNo issues detected.');
  }
}

const file = process.argv[2];
const report = buildReport(file ? loadCatalogFile(pathToFileURL(path.resolve(file))) : getCatalog());
printReport(report);
if (!report.ok) {
  console.error('\nCatalog check FAILED.');
  process.exitCode = 1;
}
