// Static analysis functions (per-card and whole catalog)
// Depends only on schema (no Node/AI SDK)

import {
  type CardDefinition,
  type Clause,
  type Condition,
  type Effect,
  type Target,
  MAX_EFFECT_VALUE,
} from './schema.ts';

// ----------------------------- Types -----------------------------
export type AnalysisIssue = { level: 'error' | 'warning'; code: string; message: string; path?: string[] };
export type AnalysisResult = { ok: boolean; issues: AnalysisIssue[]; computed?: { complexity: number; prompts: number } };

// Effect walker
export function walkEffect(e: Effect, visit: (node: Effect) => void) {
  visit(e);
  switch (e.kind) {
    case 'PlayerChoice':
      e.options.forEach(o => walkEffect(o, visit));
      break;
    case 'Sequence':
      e.steps.forEach(s => walkEffect(s, visit));
      break;
    default:
      break;
  }
}

export function walkCondition(c: Condition, visit: (node: Condition) => void) {
  visit(c);
  if (c.kind === 'Not') walkCondition(c.item, visit);
}

export function targetOf(e: Effect): Target | undefined {
  return 'target' in e ? e.target : undefined;
}

const PROMPT_TARGETS: ReadonlySet<Target['kind']> = new Set([
  'Enemy', 'EnemyOrConjury', 'OtherFriendlyActive', 'FriendlyPast', 'AnyActiveSpell', 'EnemyActiveSpell',
]);

function analyzeClauses(card: CardDefinition, list: readonly Clause[], where: 'resolve' | 'advance', issues: AnalysisIssue[]) {
  const err = (code: string, message: string, path: string[]) => issues.push({ level: 'error', code, message, path });
  const warn = (code: string, message: string, path: string[]) => issues.push({ level: 'warning', code, message, path });

  list.forEach((clause, i) => {
    const path = [where, String(i)];
    if (clause.when.kind === 'Otherwise') {
      if (where === 'advance') err('OTHERWISE_IN_ADVANCE', 'Advance clauses are applied independently; Otherwise never runs there', path);
      else if (i === 0) err('OTHERWISE_FIRST', 'Otherwise has no preceding condition', path);
      else if (i !== list.length - 1) err('OTHERWISE_NOT_LAST', 'Clauses after Otherwise are unreachable', path);
    }
    walkCondition(clause.when, c => {
      if (c.kind === 'Unknown') err('UNKNOWN_CONDITION', `Unrecognized condition ${c.raw}`, [...path, 'when']);
      if (c.kind === 'Not' && c.item.kind === 'Otherwise') err('NOT_OTHERWISE', 'Otherwise cannot be negated', [...path, 'when']);
    });
    walkEffect(clause.do, e => {
      if (e.kind === 'Unknown') err('UNKNOWN_EFFECT', `Unrecognized effect ${e.raw}`, [...path, 'do']);
      if (e.kind === 'CastExtraSpell' && where === 'advance') {
        warn('EXTRA_CAST_IN_ADVANCE', 'Spells cast during the advance phase wait on the board and do not resolve', [...path, 'do']);
      }
      if (where === 'advance' && e.kind === 'Advance' && e.target.kind === 'ThisSpell' && e.limit == null && card.priority !== 'A') {
        warn('SELF_ADVANCE_UNBOUNDED', 'Self-advance without a limit relocates every clash', [...path, 'do']);
      }
      if (e.kind === 'Recall' && e.target.kind !== 'FriendlyPast' && e.target.kind !== 'ThisSpell') {
        warn('RECALL_FOREIGN', 'Recall only returns the caster\'s own spells', [...path, 'do']);
      }
    });
  });

  const mixed = list.some(c => c.when.kind !== 'Always') && list.some(c => c.when.kind === 'Always');
  if (where === 'resolve' && mixed) {
    const firstAlways = list.findIndex(c => c.when.kind === 'Always');
    if (firstAlways < list.length - 1) warn('ALWAYS_SHADOWS', 'An Always clause ahead of other clauses makes them unreachable', ['resolve', String(firstAlways)]);
  }
}

export function analyzeCard(card: CardDefinition): AnalysisResult {
  const issues: AnalysisIssue[] = [];
  const warn = (code: string, message: string, path?: string[]) => issues.push({ level: 'warning', code, message, path });

  if (card.resolve.length === 0 && card.advance.length === 0) warn('NO_EFFECTS', 'Card does nothing');
  if (card.types.length === 0) warn('NO_TYPES', 'Card has no spell types; type-filtered scans never see it');
  if (card.conjury && !card.types.length) warn('CONJURY_UNTYPED', 'Conjury without a type');

  analyzeClauses(card, card.resolve, 'resolve', issues);
  analyzeClauses(card, card.advance, 'advance', issues);

  let complexity = 0;
  let prompts = 0;
  for (const clause of [...card.resolve, ...card.advance]) {
    if (clause.when.kind !== 'Always') complexity++;
    walkEffect(clause.do, e => {
      complexity++;
      if (e.kind === 'PlayerChoice') prompts++;
      const t = targetOf(e);
      if (t && PROMPT_TARGETS.has(t.kind)) prompts++;
      if ('value' in e && e.value != null && e.value >= MAX_EFFECT_VALUE) warn('VALUE_AT_CAP', `${e.kind} uses the maximum value`);
    });
  }

  return { ok: issues.filter(i => i.level === 'error').length === 0, issues, computed: { complexity, prompts } };
}

// Whole-catalog checks: set sizes and duplicates across sets
export function analyzeGlobal(cards: readonly CardDefinition[], setSize: number): AnalysisResult {
  const issues: AnalysisIssue[] = [];
  const bySet = new Map<string, CardDefinition[]>();
  const names = new Set<string>();
  for (const c of cards) {
    const g = bySet.get(c.set);
    if (g) g.push(c); else bySet.set(c.set, [c]);
    if (names.has(c.name)) issues.push({ level: 'warning', code: 'DUPLICATE_NAME', message: `Two cards named ${c.name}` });
    names.add(c.name);
  }
  for (const [set, group] of bySet) {
    if (group.length < setSize) {
      issues.push({ level: 'warning', code: 'SMALL_SET', message: `Set ${set} has ${group.length} cards; a drafted set cannot fill the starting hand`, path: ['sets', set] });
    }
    const elements = new Set(group.map(c => c.element));
    if (elements.size > 1) issues.push({ level: 'warning', code: 'MIXED_ELEMENTS', message: `Set ${set} mixes elements`, path: ['sets', set] });
  }
  return { ok: issues.filter(i => i.level === 'error').length === 0, issues };
}
