// Resolution scheduler: builds one ordered queue per clash and drains it

import { askOrder } from './decisions.ts';
import { executeClauses } from './effects.ts';
import { dequeue, enqueue } from './queue.ts';
import { checkTermination } from './trunks.ts';
import {
  type GameState,
  type PlayedInstance,
  describeInstance,
  emit,
  liveOnClash,
  locate,
  player,
  priorityValue,
  pushLog,
} from './state.ts';

// Same-owner, same-priority groups get one ordering decision each, before the drain
export async function buildQueue(s: GameState): Promise<void> {
  s.queue = [];
  const groups = new Map<string, PlayedInstance[]>();
  for (const inst of liveOnClash(s, s.clash)) {
    if (inst.status !== 'active') continue;
    const key = `${inst.owner}:${priorityValue(s, inst.card)}`;
    const g = groups.get(key);
    if (g) g.push(inst); else groups.set(key, [inst]);
  }
  for (const group of groups.values()) {
    const order = group.length > 1 ? await askOrder(s, player(s, group[0].owner), group) : group;
    order.forEach((inst, rank) => enqueue(s, inst, rank));
  }
}

export async function drainQueue(s: GameState): Promise<void> {
  for (let entry = dequeue(s); entry; entry = dequeue(s)) {
    const inst = entry.instance;
    if (inst.status !== 'active') continue;
    const at = locate(s, inst);
    if (!at) {
      pushLog(s, `${inst.card.name} left the board and does not resolve.`);
      continue;
    }
    if (at.clash !== s.clash) {
      pushLog(s, `${describeInstance(s, inst)} moved to Clash ${at.clash} and will not resolve now.`);
      continue;
    }
    pushLog(s, `--> Resolving ${describeInstance(s, inst)} (P:${inst.card.priority})`);
    await executeClauses(s, inst.card.resolve, { caster: inst.owner, instance: inst });
    // A spell that moved itself while resolving stays pending in its new clash
    if (inst.status === 'active' && locate(s, inst)?.clash === s.clash) inst.status = 'resolved';
    emit(s, 'SpellResolved', inst.owner, { cardId: inst.card.id, instanceId: inst.id });
    checkTermination(s);
  }
}

export async function resolvePhase(s: GameState): Promise<void> {
  s.phase = 'RESOLVE';
  pushLog(s, `--- Clash ${s.clash}: RESOLVE ---`);
  await buildQueue(s);
  if (s.queue.length === 0) pushLog(s, 'No spells to resolve this clash.');
  await drainQueue(s);
}
