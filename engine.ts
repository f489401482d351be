// Match engine: setup, the Prepare -> Cast -> Resolve -> Advance clash loop,
// and end-of-round hand management.

import { CORE_RULES, maxHandSize, type GameRules } from './core-rules.ts';
import { analyzeRules } from './rules-verifier.ts';
import type { CardDefinition } from './schema.ts';
import { type Catalog, getCatalog } from './catalog.ts';
import {
  type DecisionSource,
  HeuristicSeat,
  askCardToPlay,
  askDraft,
  askKeep,
  askRecall,
} from './decisions.ts';
import { executeAdvanceClauses } from './effects.ts';
import { resolvePhase } from './scheduler.ts';
import { checkTermination } from './trunks.ts';
import {
  type GameState,
  type PlayerState,
  RoundOver,
  clearBoard,
  createRng,
  describeInstance,
  emit,
  isContender,
  isLive,
  liveOnClash,
  locate,
  makeInstance,
  player,
  pushLog,
  shuffle,
  slot,
} from './state.ts';

export type SeatConfig = { name: string; seat?: DecisionSource };
export type MatchOptions = { seed?: number; rules?: GameRules; catalog?: Catalog };
export type MatchResult = { winner?: number; rounds: number; finished: boolean };

// ---------------- Creation & setup ----------------
export function createMatch(seats: SeatConfig[], opts: MatchOptions = {}): GameState {
  if (seats.length < 2) throw new Error('A match needs at least two players');
  const rules = opts.rules ?? CORE_RULES;
  const catalog = opts.catalog ?? getCatalog();
  if (seats.length > catalog.sets.size) {
    throw new Error(`A ${seats.length}-player match needs at least ${seats.length} sets; the catalog has ${catalog.sets.size}`);
  }
  const rng = createRng(opts.seed ?? 42);

  const players: PlayerState[] = seats.map((cfg, idx) => ({
    idx,
    name: cfg.name,
    health: rules.players.startingHealth,
    maxHealth: rules.players.startingHealth,
    trunks: rules.players.startingTrunks,
    hand: [],
    discard: [],
    board: Array.from({ length: rules.clashes.clashesPerRound }, () => []),
    invulnerable: false,
    seat: cfg.seat ?? new HeuristicSeat(),
  }));

  const deck = [...catalog.sets.values()].map(set => [...set]);
  shuffle(deck, rng);

  const s: GameState = {
    rules,
    catalog,
    players,
    round: 1,
    clash: 1,
    phase: 'SETUP',
    anchor: 0,
    log: [],
    events: [],
    queue: [],
    queueSeq: 0,
    deck,
    gameOver: false,
    winner: undefined,
    rng,
    nextInstance: 1,
  };

  // Verify ruleset consistency at startup and log results
  const analysis = analyzeRules(rules);
  if (!analysis.ok) {
    const errs = analysis.issues.filter(i => i.level === 'error');
    pushLog(s, `[RulesVerifier] Errors: ${errs.map(e => e.code).join(', ')}`);
  }
  const warns = analysis.issues.filter(i => i.level === 'warning');
  if (warns.length) {
    pushLog(s, `[RulesVerifier] Warnings: ${warns.map(w => w.code).join(', ')}`);
  }
  const catalogErrors = catalog.issues.filter(i => i.level === 'error');
  if (catalogErrors.length) {
    pushLog(s, `[Catalog] ${catalogErrors.length} error(s): ${catalogErrors.map(e => e.code).join(', ')}`);
  }

  return s;
}

// Pulls every set whose complete card list sits in discard piles back into the deck
export function rebuildDeck(s: GameState) {
  const pooled = new Set(s.players.flatMap(p => p.discard));
  const complete: CardDefinition[][] = [];
  for (const set of s.catalog.sets.values()) {
    if (set.length > 0 && set.every(c => pooled.has(c))) complete.push([...set]);
  }
  const taken = new Set(complete.flat());
  for (const p of s.players) p.discard = p.discard.filter(c => !taken.has(c));
  shuffle(complete, s.rng);
  s.deck = complete;
  pushLog(s, `The main deck was empty; rebuilt with ${complete.length} complete set(s) from discards.`);
}

// Setup never rebuilds: the only complete sets in discard piles are the ones just drafted
async function draftSet(s: GameState, p: PlayerState, into: 'hand' | 'discard'): Promise<boolean> {
  if (s.deck.length === 0 && s.phase !== 'SETUP') rebuildDeck(s);
  if (s.deck.length === 0) {
    pushLog(s, `No set is left for ${p.name} to draft.`);
    return false;
  }
  const i = await askDraft(s, p, s.deck);
  const [set] = s.deck.splice(i, 1);
  (into === 'hand' ? p.hand : p.discard).push(...set);
  pushLog(s, `${p.name} drafts the ${set[0]?.set ?? 'empty'} set.`);
  return true;
}

async function recallUpTo(s: GameState, p: PlayerState, limit: number, mandatory: boolean) {
  while (p.hand.length < limit && p.discard.length > 0) {
    const pick = await askRecall(s, p, p.discard.map((_, i) => i), mandatory);
    if (pick === null) break;
    const [card] = p.discard.splice(pick, 1);
    p.hand.push(card);
    pushLog(s, `${p.name} recalls ${card.name}.`);
    emit(s, 'SpellRecalled', p.idx, { cardId: card.id });
  }
}

export async function setupMatch(s: GameState): Promise<void> {
  s.phase = 'SETUP';
  pushLog(s, '--- Setup ---');
  for (let r = 0; r < s.rules.players.draftsAtSetup; r++) {
    for (const p of seatOrder(s)) await draftSet(s, p, 'discard');
  }
  for (const p of s.players) await recallUpTo(s, p, s.rules.players.startingHand, true);
}

// ---------------- Clash phases ----------------
export function seatOrder(s: GameState): PlayerState[] {
  const n = s.players.length;
  return Array.from({ length: n }, (_, k) => player(s, (s.anchor + k) % n));
}

export function legalIndices(s: GameState, p: PlayerState): number[] {
  const first = s.clash === 1;
  const last = s.clash === s.rules.clashes.clashesPerRound;
  const out: number[] = [];
  p.hand.forEach((card, i) => {
    if (first && card.notFirst) return;
    if (last && card.notLast) return;
    out.push(i);
  });
  return out;
}

export async function preparePhase(s: GameState): Promise<void> {
  s.phase = 'PREPARE';
  pushLog(s, `--- Clash ${s.clash}: PREPARE ---`);
  for (const p of seatOrder(s)) {
    if (!isContender(p)) continue;
    if (p.invulnerable) { pushLog(s, `${p.name} is invulnerable and sits this clash out.`); continue; }
    if (p.hand.length === 0) { pushLog(s, `${p.name} has no cards in hand.`); continue; }
    const legal = legalIndices(s, p);
    if (legal.length === 0) { pushLog(s, `${p.name} has no card that may be played in Clash ${s.clash}.`); continue; }
    const pick = await askCardToPlay(s, p, legal);
    if (pick === null) { pushLog(s, `${p.name} passes.`); continue; }
    const [card] = p.hand.splice(pick, 1);
    slot(s, p.idx, s.clash).push(makeInstance(s, card, p.idx, 'prepared'));
    pushLog(s, `${p.name} prepares a spell.`);
  }
}

// The single point where prepared spells become public
export function castPhase(s: GameState) {
  s.phase = 'CAST';
  pushLog(s, `--- Clash ${s.clash}: CAST ---`);
  for (const p of seatOrder(s)) {
    for (const inst of slot(s, p.idx, s.clash)) {
      if (inst.status !== 'prepared') continue;
      inst.status = 'active';
      pushLog(s, `${p.name} casts ${inst.card.name} (P:${inst.card.priority}).`);
      emit(s, 'SpellActive', p.idx, { cardId: inst.card.id, instanceId: inst.id });
    }
  }
}

export async function advancePhase(s: GameState): Promise<void> {
  s.phase = 'ADVANCE';
  pushLog(s, `--- Clash ${s.clash}: ADVANCE ---`);
  const advancing = liveOnClash(s, s.clash).filter(i => i.card.advance.length > 0);
  if (advancing.length === 0) {
    pushLog(s, 'No spells to advance this clash.');
    return;
  }
  for (const inst of advancing) {
    if (!isLive(inst)) continue;
    if (locate(s, inst)?.clash !== s.clash) continue;
    pushLog(s, `--> Advancing ${describeInstance(s, inst)}`);
    await executeAdvanceClauses(s, inst.card.advance, { caster: inst.owner, instance: inst });
    checkTermination(s);
  }
}

export async function runClash(s: GameState): Promise<void> {
  await preparePhase(s);
  castPhase(s);
  await resolvePhase(s);
  if (s.clash < s.rules.clashes.clashesPerRound) await advancePhase(s);
}

// ---------------- Rounds ----------------
export function startRound(s: GameState) {
  s.events = [];
  s.queue = [];
  s.clash = 1;
  pushLog(s, `--- Round ${s.round} begins ---`);
  for (const p of s.players) {
    if (isContender(p)) p.invulnerable = false;
    for (const inst of p.board.flat()) {
      inst.advances = 0;
      inst.conditionMet = false;
    }
  }
}

async function manageHand(s: GameState, p: PlayerState) {
  let drafted = false;
  if (p.hand.length === 0) {
    pushLog(s, `${p.name}'s hand is empty; they draft a new set.`);
    drafted = await draftSet(s, p, 'hand');
  } else {
    const keep = await askKeep(s, p);
    const tossed = p.hand.filter((_, i) => !keep.includes(i));
    p.hand = keep.map(i => p.hand[i]);
    if (tossed.length) {
      p.discard.push(...tossed);
      pushLog(s, `${p.name} discards ${tossed.length} card(s) from hand.`);
      emit(s, 'CardsDiscarded', p.idx, { value: tossed.length });
    }
    if (p.hand.length === 0) drafted = await draftSet(s, p, 'hand');
  }

  const limit = maxHandSize(s.rules, p.trunks);
  await recallUpTo(s, p, limit, drafted);

  if (!drafted && p.hand.length < s.rules.hand.baseHandSize && p.discard.length === 0) {
    pushLog(s, `${p.name} is short of cards with an empty discard pile; they draft a new set.`);
    if (await draftSet(s, p, 'hand')) await recallUpTo(s, p, limit, true);
  }
}

export async function endOfRound(s: GameState): Promise<void> {
  s.phase = 'END';
  pushLog(s, `--- End of Round ${s.round} ---`);
  for (const p of s.players) clearBoard(p);
  s.anchor = (s.anchor + 1) % s.players.length;
  pushLog(s, `Boards cleared. ${player(s, s.anchor).name} now leads the turn order.`);
  for (const p of s.players) {
    if (isContender(p)) await manageHand(s, p);
  }
  s.round += 1;
}

export async function runRound(s: GameState): Promise<void> {
  startRound(s);
  try {
    for (let c = 1; c <= s.rules.clashes.clashesPerRound; c++) {
      s.clash = c;
      await runClash(s);
    }
  } catch (e) {
    if (!(e instanceof RoundOver)) throw e;
    // Already-resolved effects stand; the unresolved remainder is dropped
    s.queue = [];
    pushLog(s, e.gameOver ? 'The match has ended!' : 'The round ends early after a trunk loss.');
  }
  if (!s.gameOver) await endOfRound(s);
}

export async function runMatch(s: GameState, opts: { maxRounds?: number; setup?: boolean } = {}): Promise<MatchResult> {
  if (opts.setup ?? true) await setupMatch(s);
  while (!s.gameOver) {
    if (opts.maxRounds != null && s.round > opts.maxRounds) {
      pushLog(s, `Round limit of ${opts.maxRounds} reached; the match stops without a winner.`);
      return { winner: undefined, rounds: s.round - 1, finished: false };
    }
    await runRound(s);
  }
  return { winner: s.winner, rounds: s.round, finished: true };
}

export function gameOver(s: GameState): boolean { return s.gameOver; }

export function snapshotPublic(s: GameState) {
  return {
    round: s.round,
    clash: s.clash,
    phase: s.phase,
    anchor: s.anchor,
    players: s.players.map(p => ({
      name: p.name,
      health: p.health,
      maxHealth: p.maxHealth,
      trunks: p.trunks,
      invulnerable: p.invulnerable,
      hand: p.hand.length,
      discard: p.discard.length,
      board: p.board.map(arr => arr.map(i => (i.status === 'prepared' ? '?' : `${i.card.name}${i.status === 'cancelled' ? ' (cancelled)' : ''}`))),
    })),
    winner: s.winner,
  };
}
