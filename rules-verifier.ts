// Formal-ish checker for core game rules completeness & consistency

import type { GameRules } from './core-rules.ts';

export type RuleIssue = { level: 'error' | 'warning'; code: string; message: string; path?: string[] };
export type RuleAnalysis = { ok: boolean; issues: RuleIssue[] };

const MAX_NUMERIC_PRIORITY = 5;

export function analyzeRules(r: GameRules): RuleAnalysis {
  const issues: RuleIssue[] = [];
  const err = (code: string, message: string, path?: string[]) => issues.push({ level: 'error', code, message, path });
  const warn = (code: string, message: string, path?: string[]) => issues.push({ level: 'warning', code, message, path });

  // Clashes
  if (r.clashes.clashesPerRound < 1) err('CLASHES_EMPTY', 'A round needs at least one clash', ['clashes','clashesPerRound']);
  if (r.clashes.clashesPerRound === 1) warn('SINGLE_CLASH', 'With one clash nothing can ever advance', ['clashes','clashesPerRound']);
  if (r.clashes.slowestPriority <= MAX_NUMERIC_PRIORITY) {
    err('SLOWEST_NOT_LAST', `Slowest priority must sort after ${MAX_NUMERIC_PRIORITY}`, ['clashes','slowestPriority']);
  }

  // Players
  if (r.players.startingHealth <= 0) err('START_HEALTH_ZERO', 'Starting health is not positive', ['players','startingHealth']);
  if (r.players.startingTrunks <= 0) err('START_TRUNKS_ZERO', 'Starting trunks is not positive', ['players','startingTrunks']);
  if (r.players.startingHand <= 0) err('START_HAND_ZERO', 'Starting hand is empty', ['players','startingHand']);
  if (r.players.draftsAtSetup <= 0) err('NO_SETUP_DRAFT', 'Players draft no sets at setup', ['players','draftsAtSetup']);
  if (r.hand.baseHandSize < r.players.startingHand) {
    warn('HAND_LT_START', 'Base hand size is smaller than the starting hand', ['hand','baseHandSize']);
  }

  // Trunk table
  const t = r.trunks;
  if (t.lowMaxAtOrBelow >= t.highMaxAtOrAbove) err('TRUNK_TABLE_OVERLAP', 'Low and high max-health bands overlap', ['trunks']);
  if (t.lowMaxResetTo <= 0 || t.highMaxResetTo <= 0) err('TRUNK_RESET_ZERO', 'A trunk reset leaves the player at 0 max health', ['trunks']);
  if (t.lowMaxResetTo <= t.lowMaxAtOrBelow) warn('LOW_RESET_NO_GAIN', 'Low-band reset does not raise max health', ['trunks','lowMaxResetTo']);
  if (t.highMaxResetTo >= t.highMaxAtOrAbove) warn('HIGH_RESET_NO_CAP', 'High-band reset does not lower max health', ['trunks','highMaxResetTo']);

  // Decisions
  if (r.decisions.retries < 0) err('RETRIES_NEG', 'Decision retries is negative', ['decisions','retries']);

  return { ok: issues.filter(i => i.level === 'error').length === 0, issues };
}
