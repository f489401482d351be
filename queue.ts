// Resolution queue: kept sorted on every insert so mid-drain additions land in order

import {
  type GameState,
  type PlayedInstance,
  type PlayerIndex,
  type QueueEntry,
  priorityValue,
} from './state.ts';

// Inserted after every declared entry of the same owner and priority
export const UNRANKED = Number.MAX_SAFE_INTEGER;

export function seatDistance(s: GameState, pid: PlayerIndex): number {
  const n = s.players.length;
  return (pid - s.anchor + n) % n;
}

export function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return a.priority - b.priority || a.distance - b.distance || a.rank - b.rank || a.seq - b.seq;
}

export function enqueue(s: GameState, instance: PlayedInstance, rank = UNRANKED): boolean {
  if (s.queue.some(e => e.instance === instance)) return false;
  const entry: QueueEntry = {
    instance,
    priority: priorityValue(s, instance.card),
    distance: seatDistance(s, instance.owner),
    rank,
    seq: s.queueSeq++,
  };
  let i = s.queue.length;
  while (i > 0 && compareEntries(s.queue[i - 1], entry) > 0) i--;
  s.queue.splice(i, 0, entry);
  return true;
}

export function dequeue(s: GameState): QueueEntry | undefined {
  return s.queue.shift();
}
