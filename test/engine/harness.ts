// Typed test harness for engine pre/post state testing
// ESM: keep extension-suffixed imports
import type { GameRules } from '../../core-rules.ts';
import type { CardDefinition, Clause, Condition, Effect, Priority, SpellType, Target } from '../../schema.ts';
import { cardById, extendCatalog, getCatalog } from '../../catalog.ts';
import { type DecisionSource, HeuristicSeat } from '../../decisions.ts';
import { evaluateCondition } from '../../conditions.ts';
import { executeClauses, executeEffect } from '../../effects.ts';
import {
  type MatchResult,
  advancePhase,
  castPhase,
  createMatch,
  endOfRound,
  preparePhase,
  runClash,
  runMatch,
  runRound,
  setupMatch,
  startRound,
} from '../../engine.ts';
import { resolvePhase } from '../../scheduler.ts';
import { loseTrunk } from '../../trunks.ts';
import {
  type EventType,
  type GameEvent,
  type GameState,
  type InstanceStatus,
  type Phase,
  type PlayedInstance,
  type PlayerIndex,
  type PlayerState,
  type TargetRef,
  RoundOver,
  locate,
  slot,
} from '../../state.ts';

// ---------------- Scripted decisions ----------------
// Answers are consumed in order; once a list runs dry the heuristic seat answers.
// Targets are instance ids or `P<n>` for players.
export type Script = Partial<{
  play: (number | null)[];
  choose: number[];
  target: string[];
  cancel: string[];
  order: string[][];
  discard: number[];
  keep: number[][];
  recall: (number | null)[];
  draft: number[];
}>;

export function findInstance(s: GameState, id: string): PlayedInstance | undefined {
  for (const p of s.players) {
    for (const inst of p.board.flat()) if (inst.id === id) return inst;
  }
  return undefined;
}

function requireInstance(s: GameState, id: string): PlayedInstance {
  const inst = findInstance(s, id);
  if (!inst) throw new Error(`script: no instance ${id} on any board`);
  return inst;
}

export class ScriptedSeat implements DecisionSource {
  private readonly fallback = new HeuristicSeat();
  private readonly cursor = new Map<string, number>();

  constructor(private readonly script: Script) {}

  private take<T>(key: keyof Script, list: readonly T[] | undefined): T | undefined {
    const i = this.cursor.get(key) ?? 0;
    if (!list || i >= list.length) return undefined;
    this.cursor.set(key, i + 1);
    return list[i];
  }

  chooseCardToPlay(p: PlayerState, s: GameState, legal: readonly number[]): number | null {
    const n = this.take('play', this.script.play);
    return n === undefined ? this.fallback.chooseCardToPlay(p, s, legal) : n;
  }

  makeChoice(options: readonly Effect[], caster: PlayerState, s: GameState, card: CardDefinition): Effect {
    const n = this.take('choose', this.script.choose);
    if (n === undefined) return this.fallback.makeChoice(options, caster);
    // an index past the end yields an effect outside the offered set
    return options[n] ?? { kind: 'Pass' };
  }

  chooseTarget(candidates: readonly TargetRef[], caster: PlayerState, s: GameState, effect: Effect): TargetRef {
    const id = this.take('target', this.script.target);
    if (id === undefined) return this.fallback.chooseTarget(candidates, caster, s);
    const m = /^P(\d+)$/.exec(id);
    if (m) return { kind: 'Player', player: Number(m[1]) };
    return { kind: 'Instance', instance: requireInstance(s, id) };
  }

  chooseCancellationTarget(candidates: readonly PlayedInstance[], caster: PlayerState, s: GameState): PlayedInstance {
    const id = this.take('cancel', this.script.cancel);
    return id === undefined ? this.fallback.chooseCancellationTarget(candidates, caster, s) : requireInstance(s, id);
  }

  orderSamePriority(instances: readonly PlayedInstance[], p: PlayerState, s: GameState): readonly PlayedInstance[] {
    const ids = this.take('order', this.script.order);
    return ids === undefined ? this.fallback.orderSamePriority(instances) : ids.map(id => requireInstance(s, id));
  }

  chooseCardToDiscard(p: PlayerState, s: GameState, legal: readonly number[]): number {
    return this.take('discard', this.script.discard) ?? this.fallback.chooseCardToDiscard(p, s, legal);
  }

  chooseCardsToKeep(p: PlayerState): readonly number[] {
    return this.take('keep', this.script.keep) ?? this.fallback.chooseCardsToKeep(p);
  }

  chooseRecall(p: PlayerState, s: GameState, candidates: readonly number[]): number | null {
    const n = this.take('recall', this.script.recall);
    return n === undefined ? this.fallback.chooseRecall(p, s, candidates) : n;
  }

  chooseDraftSet(): number {
    return this.take('draft', this.script.draft) ?? this.fallback.chooseDraftSet();
  }
}

// ---------------- Public harness types ----------------
export type PrePlayer = Partial<{
  name: string;
  health: number;
  maxHealth: number;
  trunks: number;
  invulnerable: boolean;
  hand: string[]; // card ids
  discard: string[];
}>;

export type PreInstance = {
  id: string; // stable handle used by actions and expectations
  card: string;
  owner: PlayerIndex;
  clash: number;
  status?: InstanceStatus; // default 'active'
  advances?: number;
  conditionMet?: boolean;
};

export type PreSetup = {
  seed?: number;
  rules?: GameRules;
  players?: PrePlayer[]; // defaults to two players
  cards?: CardDefinition[]; // layered over the shipped catalog
  instances?: PreInstance[];
  deck?: string[]; // set names, first is index 0; omitted keeps the shuffled catalog deck
  round?: number;
  clash?: number;
  anchor?: PlayerIndex;
  phase?: Phase;
  scripts?: Partial<Record<PlayerIndex, Script>>;
  seats?: Partial<Record<PlayerIndex, DecisionSource>>;
};

export type Action =
  | { kind: 'setup' }
  | { kind: 'prepare' }
  | { kind: 'cast' }
  | { kind: 'resolve' }
  | { kind: 'advance' }
  | { kind: 'clash' }
  | { kind: 'round' }
  | { kind: 'startRound' }
  | { kind: 'endOfRound' }
  | { kind: 'match'; maxRounds?: number; setup?: boolean }
  | { kind: 'execute'; source: string; effect: Effect }
  | { kind: 'clauses'; source: string }
  | { kind: 'loseTrunk'; pid: PlayerIndex }
  | { kind: 'setClash'; clash: number }
  | { kind: 'setHealth'; pid: PlayerIndex; health: number };

export type PlayerExpect = Partial<{
  health: number;
  maxHealth: number;
  trunks: number;
  invulnerable: boolean;
  hand: string[];
  discard: string[];
  handSize: number;
  discardSize: number;
}>;

export type PostExpect = {
  players?: Partial<Record<PlayerIndex, PlayerExpect>>;
  instances?: Array<{ id: string; status?: InstanceStatus; clash?: number | null; advances?: number; conditionMet?: boolean }>;
  resolved?: string[]; // instance ids, in SpellResolved order
  events?: Array<Partial<GameEvent>>; // ordered subsequence
  eventCount?: Partial<Record<EventType, number>>;
  logIncludes?: string[];
  logExcludes?: string[];
  roundOver?: 'round' | 'match' | 'none';
  gameOver?: boolean;
  winner?: PlayerIndex | undefined;
  round?: number;
  clash?: number;
  anchor?: PlayerIndex;
  queue?: string[];
  deck?: string[]; // set names
  conditions?: Array<{ source: string; when: Condition; expect: boolean }>;
  match?: Partial<MatchResult>;
  error?: string; // substring of the error the actions must throw
  verify?: (s: GameState) => string[] | Promise<string[]>;
};

export type TestCase = {
  name: string;
  pre: PreSetup;
  actions: Action[];
  expect: PostExpect;
};

export type TestResult = { name: string; ok: boolean; errors: string[] };

type RunContext = {
  roundOver: 'round' | 'match' | 'none';
  match?: MatchResult;
  known: Map<string, PlayedInstance>; // survives removal from the board
};

// ---------------- State construction ----------------
export function buildState(pre: PreSetup): GameState {
  const catalog = pre.cards?.length ? extendCatalog(getCatalog(), pre.cards) : getCatalog();
  const count = pre.players?.length ?? 2;
  const seats = Array.from({ length: count }, (_, i) => {
    const script = pre.scripts?.[i];
    return {
      name: pre.players?.[i]?.name ?? `P${i}`,
      seat: pre.seats?.[i] ?? (script ? new ScriptedSeat(script) : undefined),
    };
  });
  const s = createMatch(seats, { seed: pre.seed, rules: pre.rules, catalog });

  if (pre.deck) {
    s.deck = pre.deck.map(name => {
      const set = catalog.sets.get(name);
      if (!set) throw new Error(`Unknown set ${name}`);
      return [...set];
    });
  }

  (pre.players ?? []).forEach((pp, i) => {
    const p = s.players[i];
    if (pp.maxHealth != null) p.maxHealth = pp.maxHealth;
    if (pp.health != null) p.health = pp.health;
    if (pp.trunks != null) p.trunks = pp.trunks;
    if (pp.invulnerable != null) p.invulnerable = pp.invulnerable;
    p.hand = (pp.hand ?? []).map(id => cardById(catalog, id));
    p.discard = (pp.discard ?? []).map(id => cardById(catalog, id));
  });

  for (const pi of pre.instances ?? []) {
    slot(s, pi.owner, pi.clash).push({
      id: pi.id,
      card: cardById(catalog, pi.card),
      owner: pi.owner,
      status: pi.status ?? 'active',
      advances: pi.advances ?? 0,
      conditionMet: pi.conditionMet ?? false,
    });
  }

  if (pre.round != null) s.round = pre.round;
  if (pre.clash != null) s.clash = pre.clash;
  if (pre.anchor != null) s.anchor = pre.anchor;
  if (pre.phase != null) s.phase = pre.phase;
  return s;
}

function remember(s: GameState, ctx: RunContext) {
  for (const p of s.players) for (const inst of p.board.flat()) ctx.known.set(inst.id, inst);
}

function knownInstance(s: GameState, ctx: RunContext, id: string): PlayedInstance {
  const inst = findInstance(s, id) ?? ctx.known.get(id);
  if (!inst) throw new Error(`unknown instance ${id}`);
  return inst;
}

// RoundOver is recorded instead of failing the case
async function guarded(ctx: RunContext, step: () => void | Promise<void>) {
  try {
    await step();
  } catch (e) {
    if (!(e instanceof RoundOver)) throw e;
    ctx.roundOver = e.gameOver ? 'match' : 'round';
  }
}

export async function execActions(s: GameState, actions: Action[], ctx: RunContext) {
  for (const a of actions) {
    switch (a.kind) {
      case 'setup': await setupMatch(s); break;
      case 'prepare': await preparePhase(s); break;
      case 'cast': castPhase(s); break;
      case 'resolve': await guarded(ctx, () => resolvePhase(s)); break;
      case 'advance': await guarded(ctx, () => advancePhase(s)); break;
      case 'clash': await guarded(ctx, () => runClash(s)); break;
      case 'round': await runRound(s); break;
      case 'startRound': startRound(s); break;
      case 'endOfRound': await endOfRound(s); break;
      case 'match': ctx.match = await runMatch(s, { maxRounds: a.maxRounds, setup: a.setup }); break;
      case 'execute': {
        const inst = knownInstance(s, ctx, a.source);
        await executeEffect(s, a.effect, { caster: inst.owner, instance: inst });
        break;
      }
      case 'clauses': {
        const inst = knownInstance(s, ctx, a.source);
        await executeClauses(s, inst.card.resolve, { caster: inst.owner, instance: inst });
        break;
      }
      case 'loseTrunk': loseTrunk(s, a.pid); break;
      case 'setClash': s.clash = a.clash; break;
      case 'setHealth': s.players[a.pid].health = a.health; break;
      default: ((x: never) => { throw new Error(`Unreachable action: ${String(x)}`); })(a);
    }
    remember(s, ctx);
  }
}

// ---------------- Verification ----------------
function sameMultiset(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const ca = [...a].sort();
  const cb = [...b].sort();
  return ca.every((x, i) => x === cb[i]);
}

function eventMatches(e: GameEvent, want: Partial<GameEvent>): boolean {
  return (Object.keys(want) as (keyof GameEvent)[]).every(k => e[k] === want[k]);
}

const showEvent = (e: Partial<GameEvent>) => JSON.stringify(e);

export function verifyExpect(s: GameState, exp: PostExpect, ctx: RunContext): string[] {
  const errors: string[] = [];
  const check = (label: string, want: unknown, got: unknown) => {
    if (want !== got) errors.push(`${label} expected=${String(want)} got=${String(got)}`);
  };

  if (exp.round != null) check('round', exp.round, s.round);
  if (exp.clash != null) check('clash', exp.clash, s.clash);
  if (exp.anchor != null) check('anchor', exp.anchor, s.anchor);
  if (exp.gameOver != null) check('gameOver', exp.gameOver, s.gameOver);
  if ('winner' in exp) check('winner', exp.winner, s.winner);
  if (exp.roundOver) check('roundOver', exp.roundOver, ctx.roundOver);

  for (const [key, e] of Object.entries(exp.players ?? {})) {
    if (!e) continue;
    const p = s.players[Number(key)];
    if (!p) { errors.push(`player ${key} missing`); continue; }
    if (e.health != null) check(`p${key}.health`, e.health, p.health);
    if (e.maxHealth != null) check(`p${key}.maxHealth`, e.maxHealth, p.maxHealth);
    if (e.trunks != null) check(`p${key}.trunks`, e.trunks, p.trunks);
    if (e.invulnerable != null) check(`p${key}.invulnerable`, e.invulnerable, p.invulnerable);
    if (e.handSize != null) check(`p${key}.handSize`, e.handSize, p.hand.length);
    if (e.discardSize != null) check(`p${key}.discardSize`, e.discardSize, p.discard.length);
    if (e.hand) {
      const got = p.hand.map(c => c.id);
      if (!sameMultiset(e.hand, got)) errors.push(`p${key}.hand mismatch: expected=[${e.hand.join(',')}], got=[${got.join(',')}]`);
    }
    if (e.discard) {
      const got = p.discard.map(c => c.id);
      if (!sameMultiset(e.discard, got)) errors.push(`p${key}.discard mismatch: expected=[${e.discard.join(',')}], got=[${got.join(',')}]`);
    }
  }

  for (const want of exp.instances ?? []) {
    const inst = findInstance(s, want.id) ?? ctx.known.get(want.id);
    if (!inst) { errors.push(`instance ${want.id} missing`); continue; }
    if (want.status) check(`${want.id}.status`, want.status, inst.status);
    if (want.advances != null) check(`${want.id}.advances`, want.advances, inst.advances);
    if (want.conditionMet != null) check(`${want.id}.conditionMet`, want.conditionMet, inst.conditionMet);
    if (want.clash !== undefined) check(`${want.id}.clash`, want.clash, locate(s, inst)?.clash ?? null);
  }

  if (exp.resolved) {
    const got = s.events.filter(e => e.type === 'SpellResolved').map(e => e.instanceId ?? '?');
    if (got.join(',') !== exp.resolved.join(',')) {
      errors.push(`resolved order expected=[${exp.resolved.join(',')}] got=[${got.join(',')}]`);
    }
  }

  if (exp.events) {
    let from = 0;
    for (const want of exp.events) {
      const at = s.events.findIndex((e, i) => i >= from && eventMatches(e, want));
      if (at < 0) { errors.push(`event not found in order: ${showEvent(want)}`); break; }
      from = at + 1;
    }
  }

  for (const [type, n] of Object.entries(exp.eventCount ?? {})) {
    check(`count(${type})`, n, s.events.filter(e => e.type === type).length);
  }

  if (exp.queue) {
    const got = s.queue.map(e => e.instance.id);
    if (got.join(',') !== exp.queue.join(',')) errors.push(`queue expected=[${exp.queue.join(',')}] got=[${got.join(',')}]`);
  }

  if (exp.deck) {
    const got = s.deck.map(set => set[0]?.set ?? '?');
    if (got.join(',') !== exp.deck.join(',')) errors.push(`deck expected=[${exp.deck.join(',')}] got=[${got.join(',')}]`);
  }

  for (const c of exp.conditions ?? []) {
    const inst = findInstance(s, c.source) ?? ctx.known.get(c.source);
    if (!inst) { errors.push(`condition source ${c.source} missing`); continue; }
    const got = evaluateCondition(c.when, s, inst.owner, inst);
    if (got !== c.expect) errors.push(`condition ${JSON.stringify(c.when)} on ${c.source} expected=${c.expect} got=${got}`);
  }

  if (exp.match) {
    const got = ctx.match;
    if (!got) errors.push('no match was run');
    else {
      if ('winner' in exp.match) check('match.winner', exp.match.winner, got.winner);
      if (exp.match.finished != null) check('match.finished', exp.match.finished, got.finished);
      if (exp.match.rounds != null) check('match.rounds', exp.match.rounds, got.rounds);
    }
  }

  for (const needle of exp.logIncludes ?? []) {
    if (!s.log.some(l => l.includes(needle))) errors.push(`log missing: ${needle}`);
  }
  for (const needle of exp.logExcludes ?? []) {
    if (s.log.some(l => l.includes(needle))) errors.push(`log unexpectedly has: ${needle}`);
  }

  return errors;
}

export async function runCase(tc: TestCase): Promise<TestResult> {
  const ctx: RunContext = { roundOver: 'none', known: new Map() };
  try {
    const s = buildState(tc.pre);
    remember(s, ctx);
    await execActions(s, tc.actions, ctx);
    if (tc.expect.error) return { name: tc.name, ok: false, errors: [`expected an error containing "${tc.expect.error}"`] };
    const errors = verifyExpect(s, tc.expect, ctx);
    if (tc.expect.verify) errors.push(...(await tc.expect.verify(s)));
    return { name: tc.name, ok: errors.length === 0, errors };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    if (tc.expect.error && msg.includes(tc.expect.error)) return { name: tc.name, ok: true, errors: [] };
    return { name: tc.name, ok: false, errors: [`threw: ${msg}`] };
  }
}

export async function runAll(cases: TestCase[]): Promise<{ results: TestResult[]; failed: number }> {
  const results: TestResult[] = [];
  for (const tc of cases) results.push(await runCase(tc));
  const failed = results.filter(r => !r.ok).length;
  return { results, failed };
}

// ---------------- Convenience builders ----------------
export type SpellOptions = Partial<{
  name: string;
  set: string;
  element: string;
  priority: Priority;
  types: SpellType[];
  conjury: boolean;
  notFirst: boolean;
  notLast: boolean;
  resolve: Clause[];
  advance: Clause[];
}>;

export function mkSpell(id: string, opts: SpellOptions = {}): CardDefinition {
  return {
    id,
    name: opts.name ?? id,
    set: opts.set ?? `test-${id}`,
    element: opts.element ?? 'test',
    priority: opts.priority ?? 3,
    types: opts.types ?? ['attack'],
    conjury: opts.conjury ?? false,
    notFirst: opts.notFirst ?? false,
    notLast: opts.notLast ?? false,
    resolve: opts.resolve ?? [],
    advance: opts.advance ?? [],
  };
}

export const always = (effect: Effect): Clause => ({ when: { kind: 'Always' }, do: effect });
export const when = (cond: Condition, effect: Effect): Clause => ({ when: cond, do: effect });
export const otherwise = (effect: Effect): Clause => ({ when: { kind: 'Otherwise' }, do: effect });

export const damage = (value: number, target: Target = { kind: 'Enemy' }): Effect => ({ kind: 'Damage', target, value });
export const heal = (value: number, target: Target = { kind: 'Self' }): Effect => ({ kind: 'Heal', target, value });
