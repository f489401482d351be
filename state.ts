// Runtime match state and the primitives every engine module mutates it through

import type { GameRules } from './core-rules.ts';
import type { CardDefinition, SpellFilter } from './schema.ts';
import { matchesFilter } from './schema.ts';
import type { Catalog } from './catalog.ts';
import type { DecisionSource } from './decisions.ts';

// ---------------- Types for runtime ----------------
export type PlayerIndex = number;

// 'resolved' instances stay on the board and still count for board scans
export type InstanceStatus = 'prepared' | 'active' | 'resolved' | 'cancelled';

export type Phase = 'SETUP' | 'PREPARE' | 'CAST' | 'RESOLVE' | 'ADVANCE' | 'END';

export type PlayedInstance = {
  id: string;
  card: CardDefinition;
  owner: PlayerIndex;
  status: InstanceStatus;
  advances: number; // this round
  conditionMet: boolean; // a non-trivial resolve clause matched this round
};

export type PlayerState = {
  idx: PlayerIndex;
  name: string;
  health: number;
  maxHealth: number;
  trunks: number;
  hand: CardDefinition[];
  discard: CardDefinition[];
  board: PlayedInstance[][]; // one slot per clash
  invulnerable: boolean;
  seat: DecisionSource;
};

export type TargetRef =
  | { kind: 'Player'; player: PlayerIndex }
  | { kind: 'Instance'; instance: PlayedInstance };

export type EventType =
  | 'SpellActive'
  | 'SpellResolved'
  | 'PlayerDamaged'
  | 'PlayerHealed'
  | 'PlayerWeakened'
  | 'PlayerBolstered'
  | 'SpellCancelled'
  | 'SpellAdvanced'
  | 'ExtraSpellCast'
  | 'CardsDiscarded'
  | 'SpellRecalled'
  | 'TrunkLost'
  | 'PlayerEliminated';

export type GameEvent = {
  round: number;
  clash: number;
  type: EventType;
  player: PlayerIndex;
  cardId?: string;
  instanceId?: string;
  target?: PlayerIndex;
  value?: number;
};

export type QueueEntry = {
  instance: PlayedInstance;
  priority: number;
  distance: number; // seats after the anchor
  rank: number; // owner's declared sub-order among equal priorities
  seq: number;
};

export type GameState = {
  rules: GameRules;
  catalog: Catalog;
  players: PlayerState[];
  round: number;
  clash: number; // 1-based
  phase: Phase;
  anchor: PlayerIndex;
  log: string[];
  events: GameEvent[]; // current round only
  queue: QueueEntry[];
  queueSeq: number;
  deck: CardDefinition[][]; // undrafted sets
  gameOver: boolean;
  winner?: PlayerIndex;
  rng: () => number;
  nextInstance: number;
};

// Control-flow signal: the round stops and goes straight to bookkeeping
export class RoundOver extends Error {
  readonly gameOver: boolean;
  constructor(gameOver: boolean) {
    super(gameOver ? 'Match over' : 'Round over');
    this.name = 'RoundOver';
    this.gameOver = gameOver;
  }
}

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

// ---------------- Utilities ----------------
// Exhaustiveness guard used across discriminated unions
export const exhaustive = (x: never): never => { throw new Error(`Unreachable: ${String(x)}`); };

export function pushLog(s: GameState, msg: string) { s.log.push(msg); }

export function emit(s: GameState, type: EventType, player: PlayerIndex, extra: Omit<GameEvent, 'round' | 'clash' | 'type' | 'player'> = {}) {
  s.events.push({ round: s.round, clash: s.clash, type, player, ...extra });
}

export function createRng(seed: number): () => number {
  let state = (seed >>> 0) || 1;
  return () => {
    // xorshift32
    state ^= state << 13; state >>>= 0;
    state ^= state >> 17; state >>>= 0;
    state ^= state << 5;  state >>>= 0;
    return (state >>> 0) / 0x100000000;
  };
}

export function shuffle<T>(arr: T[], rng: () => number) {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

export function makeInstance(s: GameState, card: CardDefinition, owner: PlayerIndex, status: InstanceStatus): PlayedInstance {
  return { id: `I${s.nextInstance++}`, card, owner, status, advances: 0, conditionMet: false };
}

export function player(s: GameState, pid: PlayerIndex): PlayerState {
  const p = s.players[pid];
  if (!p) throw new InvariantViolation(`No player at seat ${pid}`);
  return p;
}

export function isContender(p: PlayerState): boolean { return p.trunks > 0; }
export function isVulnerable(p: PlayerState): boolean { return p.trunks > 0 && !p.invulnerable; }
export function isLive(i: PlayedInstance): boolean { return i.status === 'active' || i.status === 'resolved'; }

// Enemies that may still be targeted this round
export function validEnemies(s: GameState, pid: PlayerIndex): PlayerState[] {
  return s.players.filter(p => p.idx !== pid && isVulnerable(p));
}

export function slot(s: GameState, pid: PlayerIndex, clash: number): PlayedInstance[] {
  const arr = player(s, pid).board[clash - 1];
  if (!arr) throw new InvariantViolation(`Clash ${clash} is outside the board`);
  return arr;
}

// Live instances on one clash slot, in seat order
export function liveOnClash(s: GameState, clash: number, owner?: PlayerIndex): PlayedInstance[] {
  const out: PlayedInstance[] = [];
  for (const p of s.players) {
    if (owner != null && p.idx !== owner) continue;
    for (const inst of slot(s, p.idx, clash)) if (isLive(inst)) out.push(inst);
  }
  return out;
}

export function countLive(list: PlayedInstance[], filter: SpellFilter, exclude?: PlayedInstance): number {
  return list.filter(i => i !== exclude && matchesFilter(i.card, filter)).length;
}

export function locate(s: GameState, inst: PlayedInstance): { clash: number; index: number } | undefined {
  const board = player(s, inst.owner).board;
  for (let c = 0; c < board.length; c++) {
    const index = board[c].indexOf(inst);
    if (index >= 0) return { clash: c + 1, index };
  }
  return undefined;
}

export function requireLocation(s: GameState, inst: PlayedInstance): { clash: number; index: number } {
  const at = locate(s, inst);
  if (!at) throw new InvariantViolation(`Instance ${inst.id} (${inst.card.name}) is on no board`);
  return at;
}

export function removeFromBoard(s: GameState, inst: PlayedInstance): number {
  const at = requireLocation(s, inst);
  slot(s, inst.owner, at.clash).splice(at.index, 1);
  return at.clash;
}

export function clearBoard(p: PlayerState): number {
  let n = 0;
  for (const arr of p.board) {
    for (const inst of arr) { p.discard.push(inst.card); n++; }
    arr.length = 0;
  }
  return n;
}

export function priorityValue(s: GameState, card: CardDefinition): number {
  return card.priority === 'A' ? s.rules.clashes.slowestPriority : card.priority;
}

export function describeInstance(s: GameState, inst: PlayedInstance): string {
  return `${player(s, inst.owner).name}'s ${inst.card.name}`;
}

export function describeTarget(s: GameState, t: TargetRef): string {
  switch (t.kind) {
    case 'Player': return player(s, t.player).name;
    case 'Instance': return describeInstance(s, t.instance);
    default: return exhaustive(t);
  }
}
