// Decision interface consumed at every suspension point, plus boundary validation
// and the deterministic heuristic used as the default seat

import type { CardDefinition, Effect } from './schema.ts';
import {
  type GameState,
  type PlayedInstance,
  type PlayerState,
  type TargetRef,
  priorityValue,
  pushLog,
} from './state.ts';

export type Awaitable<T> = T | Promise<T>;

// Every call returns one member of the candidate set it was given.
// Sources may be synchronous (heuristics, scripts) or asynchronous (humans, remote models).
export interface DecisionSource {
  chooseCardToPlay(p: PlayerState, s: GameState, legalIndices: readonly number[]): Awaitable<number | null>;
  makeChoice(validOptions: readonly Effect[], caster: PlayerState, s: GameState, currentCard: CardDefinition): Awaitable<Effect>;
  chooseTarget(candidates: readonly TargetRef[], caster: PlayerState, s: GameState, effect: Effect): Awaitable<TargetRef>;
  chooseCancellationTarget(candidates: readonly PlayedInstance[], caster: PlayerState, s: GameState): Awaitable<PlayedInstance>;
  orderSamePriority(instances: readonly PlayedInstance[], p: PlayerState, s: GameState): Awaitable<readonly PlayedInstance[]>;
  chooseCardToDiscard(p: PlayerState, s: GameState, legalIndices: readonly number[]): Awaitable<number>;
  chooseCardsToKeep(p: PlayerState, s: GameState): Awaitable<readonly number[]>;
  chooseRecall(p: PlayerState, s: GameState, discardIndices: readonly number[], mandatory: boolean): Awaitable<number | null>;
  chooseDraftSet(p: PlayerState, s: GameState, sets: readonly (readonly CardDefinition[])[]): Awaitable<number>;
}

// ---------------- Boundary validation ----------------
// Asks up to 1 + retries times; answers outside the candidate set are logged and never applied
async function decide<T, R>(
  s: GameState,
  who: PlayerState,
  what: string,
  ask: () => Awaitable<T>,
  accept: (answer: T) => R | undefined,
  fallback: () => R,
): Promise<R> {
  for (let attempt = 0; attempt <= s.rules.decisions.retries; attempt++) {
    const answer = await ask();
    const accepted = accept(answer);
    if (accepted !== undefined) return accepted;
    pushLog(s, `[Decision] ${who.name} gave an invalid ${what}: ${String(answer)}`);
  }
  pushLog(s, `[Decision] ${who.name}'s ${what} defaulted.`);
  return fallback();
}

export function sameTarget(a: TargetRef, b: TargetRef): boolean {
  if (a.kind === 'Player' && b.kind === 'Player') return a.player === b.player;
  if (a.kind === 'Instance' && b.kind === 'Instance') return a.instance === b.instance;
  return false;
}

const isIndexIn = (legal: readonly number[]) => (n: number | null): number | undefined =>
  n != null && legal.includes(n) ? n : undefined;

export function askCardToPlay(s: GameState, p: PlayerState, legal: readonly number[]): Promise<number | null> {
  return decide<number | null, number | null>(
    s, p, 'card to play',
    () => p.seat.chooseCardToPlay(p, s, legal),
    n => (n === null ? null : isIndexIn(legal)(n)),
    () => null,
  );
}

export function askChoice(s: GameState, caster: PlayerState, options: readonly Effect[], card: CardDefinition): Promise<Effect> {
  return decide(
    s, caster, 'choice',
    () => caster.seat.makeChoice(options, caster, s, card),
    (e: Effect) => (options.includes(e) ? e : undefined),
    () => options[0],
  );
}

export function askTarget(s: GameState, caster: PlayerState, candidates: readonly TargetRef[], effect: Effect): Promise<TargetRef> {
  return decide(
    s, caster, 'target',
    () => caster.seat.chooseTarget(candidates, caster, s, effect),
    (t: TargetRef) => candidates.find(c => sameTarget(c, t)),
    () => candidates[0],
  );
}

export function askCancellation(s: GameState, caster: PlayerState, candidates: readonly PlayedInstance[]): Promise<PlayedInstance> {
  return decide(
    s, caster, 'cancellation target',
    () => caster.seat.chooseCancellationTarget(candidates, caster, s),
    (i: PlayedInstance) => (candidates.includes(i) ? i : undefined),
    () => candidates[0],
  );
}

export function askOrder(s: GameState, p: PlayerState, instances: readonly PlayedInstance[]): Promise<readonly PlayedInstance[]> {
  const isPermutation = (order: readonly PlayedInstance[]) =>
    order.length === instances.length && instances.every(i => order.filter(o => o === i).length === 1);
  return decide(
    s, p, 'resolution order',
    () => p.seat.orderSamePriority(instances, p, s),
    (order: readonly PlayedInstance[]) => (isPermutation(order) ? order : undefined),
    () => instances,
  );
}

export function askDiscard(s: GameState, p: PlayerState, legal: readonly number[]): Promise<number> {
  return decide(
    s, p, 'discard',
    () => p.seat.chooseCardToDiscard(p, s, legal),
    isIndexIn(legal),
    () => legal[0],
  );
}

export function askKeep(s: GameState, p: PlayerState): Promise<readonly number[]> {
  const valid = (keep: readonly number[]) =>
    keep.every(i => Number.isInteger(i) && i >= 0 && i < p.hand.length) && new Set(keep).size === keep.length;
  return decide(
    s, p, 'keep selection',
    () => p.seat.chooseCardsToKeep(p, s),
    (keep: readonly number[]) => (valid(keep) ? keep : undefined),
    () => p.hand.map((_, i) => i),
  );
}

export function askRecall(s: GameState, p: PlayerState, candidates: readonly number[], mandatory: boolean): Promise<number | null> {
  return decide<number | null, number | null>(
    s, p, 'recall',
    () => p.seat.chooseRecall(p, s, candidates, mandatory),
    n => (n === null ? (mandatory ? undefined : null) : isIndexIn(candidates)(n)),
    () => (mandatory ? candidates[0] : null),
  );
}

export function askDraft(s: GameState, p: PlayerState, sets: readonly (readonly CardDefinition[])[]): Promise<number> {
  const legal = sets.map((_, i) => i);
  return decide(
    s, p, 'draft',
    () => p.seat.chooseDraftSet(p, s, sets),
    isIndexIn(legal),
    () => 0,
  );
}

// ---------------- Heuristic seat ----------------
const HEALING: ReadonlySet<Effect['kind']> = new Set(['Heal', 'HealPerSpell', 'Bolster']);
const HARMFUL: ReadonlySet<Effect['kind']> = new Set(['Damage', 'DamageMulti', 'DamagePerSpell', 'Weaken', 'WeakenPerSpell']);

function containsKind(e: Effect, kinds: ReadonlySet<Effect['kind']>): boolean {
  if (kinds.has(e.kind)) return true;
  if (e.kind === 'Sequence') return e.steps.some(x => containsKind(x, kinds));
  if (e.kind === 'PlayerChoice') return e.options.some(x => containsKind(x, kinds));
  return false;
}

const isHurt = (p: PlayerState) => p.health * 2 <= p.maxHealth;

// Deterministic defaults: no lookahead, no randomness
export class HeuristicSeat implements DecisionSource {
  chooseCardToPlay(p: PlayerState, _s: GameState, legal: readonly number[]): number | null {
    if (legal.length === 0) return null;
    const wanted = isHurt(p) ? 'remedy' : 'attack';
    return legal.find(i => p.hand[i]?.types.includes(wanted)) ?? legal[0];
  }

  makeChoice(options: readonly Effect[], caster: PlayerState): Effect {
    const kinds = isHurt(caster) ? HEALING : HARMFUL;
    return options.find(o => containsKind(o, kinds)) ?? options[0];
  }

  // Lowest-priority-value conjuries, then the lowest-health player, then the first candidate
  chooseTarget(candidates: readonly TargetRef[], _caster: PlayerState, s: GameState): TargetRef {
    let best: TargetRef | undefined;
    let bestPriority = Infinity;
    for (const c of candidates) {
      if (c.kind !== 'Instance' || !c.instance.card.conjury) continue;
      const pv = priorityValue(s, c.instance.card);
      if (pv < bestPriority) { best = c; bestPriority = pv; }
    }
    if (best) return best;
    let lowest = Infinity;
    for (const c of candidates) {
      if (c.kind !== 'Player') continue;
      const health = s.players[c.player]?.health ?? Infinity;
      if (health < lowest) { best = c; lowest = health; }
    }
    return best ?? candidates[0];
  }

  chooseCancellationTarget(candidates: readonly PlayedInstance[], _caster: PlayerState, s: GameState): PlayedInstance {
    return candidates.reduce((a, b) => (priorityValue(s, b.card) < priorityValue(s, a.card) ? b : a));
  }

  orderSamePriority(instances: readonly PlayedInstance[]): readonly PlayedInstance[] {
    return instances;
  }

  chooseCardToDiscard(_p: PlayerState, _s: GameState, legal: readonly number[]): number {
    return legal[legal.length - 1];
  }

  chooseCardsToKeep(p: PlayerState): readonly number[] {
    return p.hand.map((_, i) => i);
  }

  chooseRecall(_p: PlayerState, _s: GameState, candidates: readonly number[]): number | null {
    return candidates.length ? candidates[0] : null;
  }

  chooseDraftSet(): number {
    return 0;
  }
}
