// Effect executor: interprets clause lists and effect trees against match state.
// Every mutation here is paired with a log line and, for state changes, an event.

import type { Clause, Effect, SpellFilter, Target } from './schema.ts';
import { effectToText } from './ability-text-generator.ts';
import { evaluateCondition } from './conditions.ts';
import { askCardToPlay, askChoice, askDiscard } from './decisions.ts';
import { enqueue } from './queue.ts';
import { type ResolutionContext, resolveTargets, targetCandidates } from './targets.ts';
import { loseTrunk } from './trunks.ts';
import {
  type GameState,
  type PlayedInstance,
  type PlayerIndex,
  type TargetRef,
  countLive,
  describeInstance,
  describeTarget,
  emit,
  exhaustive,
  isVulnerable,
  liveOnClash,
  makeInstance,
  player,
  pushLog,
  removeFromBoard,
  requireLocation,
  slot,
} from './state.ts';

export type { ResolutionContext } from './targets.ts';

const sourceOf = (ctx: ResolutionContext) => ({ cardId: ctx.instance.card.id, instanceId: ctx.instance.id });

// ---------------- Instance primitives ----------------
export function cancelInstance(s: GameState, inst: PlayedInstance): boolean {
  if (inst.status === 'cancelled') return false;
  inst.status = 'cancelled';
  pushLog(s, `${describeInstance(s, inst)} is cancelled.`);
  emit(s, 'SpellCancelled', inst.owner, { cardId: inst.card.id, instanceId: inst.id });
  return true;
}

// Moves to the slot after the current clash; a moved instance is pending again there
export function advanceInstance(s: GameState, inst: PlayedInstance, limit?: number): boolean {
  const last = s.rules.clashes.clashesPerRound;
  const to = s.clash + 1;
  if (limit != null && inst.advances >= limit) {
    pushLog(s, `${describeInstance(s, inst)} has already advanced ${inst.advances} time(s) this round and stays put.`);
    return false;
  }
  if (to > last) {
    pushLog(s, `${describeInstance(s, inst)} cannot advance past Clash ${last}.`);
    return false;
  }
  const from = requireLocation(s, inst).clash;
  removeFromBoard(s, inst);
  slot(s, inst.owner, to).push(inst);
  inst.advances += 1;
  if (inst.status === 'resolved') inst.status = 'active';
  pushLog(s, `${describeInstance(s, inst)} advances from Clash ${from} to Clash ${to}.`);
  emit(s, 'SpellAdvanced', inst.owner, { cardId: inst.card.id, instanceId: inst.id, value: to });
  return true;
}

// ---------------- Player primitives ----------------
function damagePlayer(s: GameState, ctx: ResolutionContext, pid: PlayerIndex, amount: number) {
  const p = player(s, pid);
  if (!isVulnerable(p)) {
    pushLog(s, `${p.name} is invulnerable; ${ctx.instance.card.name} deals no damage.`);
    return;
  }
  const before = p.health;
  p.health = Math.max(0, p.health - amount);
  pushLog(s, `${ctx.instance.card.name} deals ${amount} damage to ${p.name} (${p.health}/${p.maxHealth}).`);
  emit(s, 'PlayerDamaged', ctx.caster, { ...sourceOf(ctx), target: pid, value: amount });
  if (before > 0 && p.health === 0) loseTrunk(s, pid);
}

function healPlayer(s: GameState, ctx: ResolutionContext, pid: PlayerIndex, amount: number) {
  const p = player(s, pid);
  const healed = Math.min(p.maxHealth, p.health + amount) - p.health;
  p.health += healed;
  pushLog(s, `${p.name} heals ${healed} (${p.health}/${p.maxHealth}).`);
  emit(s, 'PlayerHealed', ctx.caster, { ...sourceOf(ctx), target: pid, value: healed });
}

function weakenPlayer(s: GameState, ctx: ResolutionContext, pid: PlayerIndex, amount: number) {
  const p = player(s, pid);
  if (!isVulnerable(p)) {
    pushLog(s, `${p.name} is invulnerable; ${ctx.instance.card.name} does not weaken them.`);
    return;
  }
  p.maxHealth = Math.max(0, p.maxHealth - amount);
  p.health = Math.min(p.health, p.maxHealth);
  pushLog(s, `${p.name} is weakened by ${amount} (${p.health}/${p.maxHealth}).`);
  emit(s, 'PlayerWeakened', ctx.caster, { ...sourceOf(ctx), target: pid, value: amount });
}

function bolsterPlayer(s: GameState, ctx: ResolutionContext, pid: PlayerIndex, amount: number) {
  const p = player(s, pid);
  p.maxHealth += amount;
  pushLog(s, `${p.name} is bolstered by ${amount} (${p.health}/${p.maxHealth}).`);
  emit(s, 'PlayerBolstered', ctx.caster, { ...sourceOf(ctx), target: pid, value: amount });
}

// Conjuries have no health: any damage or weaken cancels them
function hitInstance(s: GameState, inst: PlayedInstance) {
  if (inst.card.conjury) cancelInstance(s, inst);
  else pushLog(s, `${describeInstance(s, inst)} has no health and is unaffected.`);
}

type Harm = 'damage' | 'heal' | 'weaken';

function applyAmount(s: GameState, ctx: ResolutionContext, t: TargetRef, harm: Harm, amount: number) {
  switch (t.kind) {
    case 'Player':
      if (harm === 'damage') damagePlayer(s, ctx, t.player, amount);
      else if (harm === 'weaken') weakenPlayer(s, ctx, t.player, amount);
      else healPlayer(s, ctx, t.player, amount);
      return;
    case 'Instance':
      if (harm === 'heal') pushLog(s, `${describeInstance(s, t.instance)} cannot be healed.`);
      else hitInstance(s, t.instance);
      return;
    default: exhaustive(t);
  }
}

function liveCount(s: GameState, ctx: ResolutionContext, filter: SpellFilter, excludeSelf?: boolean): number {
  return countLive(liveOnClash(s, s.clash, ctx.caster), filter, excludeSelf ? ctx.instance : undefined);
}

// ---------------- Legality for PlayerChoice ----------------
export function hasTargets(s: GameState, e: Effect, ctx: ResolutionContext): boolean {
  switch (e.kind) {
    case 'DiscardFromHand':
      return targetCandidates(s, e.target, ctx).some(t => t.kind === 'Player' && player(s, t.player).hand.length > 0);
    case 'Damage': case 'DamageMulti': case 'DamagePerSpell': case 'HealPerSpell': case 'WeakenPerSpell':
    case 'Heal': case 'Weaken': case 'Bolster': case 'Advance': case 'Cancel': case 'Recall':
      return targetCandidates(s, e.target, ctx).length > 0;
    case 'CastExtraSpell': return player(s, ctx.caster).hand.length > 0;
    case 'PlayerChoice': return e.options.some(o => hasTargets(s, o, ctx));
    case 'Sequence': return e.steps.some(o => hasTargets(s, o, ctx));
    case 'Pass': return true;
    case 'Unknown': return false;
    default: return exhaustive(e);
  }
}

// ---------------- Effect interpreter ----------------
type Targeted = Extract<Effect, { target: Target }>;

async function targetsFor(s: GameState, e: Targeted, ctx: ResolutionContext): Promise<TargetRef[]> {
  const targets = await resolveTargets(s, e.target, ctx, e);
  if (targets.length === 0) pushLog(s, `${ctx.instance.card.name}: no legal target for ${e.kind}.`);
  return targets;
}

export async function executeEffect(s: GameState, e: Effect, ctx: ResolutionContext): Promise<void> {
  switch (e.kind) {
    case 'Damage':
    case 'DamageMulti': {
      for (const t of await targetsFor(s, e, ctx)) applyAmount(s, ctx, t, 'damage', e.value);
      return;
    }
    case 'DamagePerSpell':
    case 'HealPerSpell':
    case 'WeakenPerSpell': {
      // Counted at execution time so spells cast mid-clash are included
      const n = liveCount(s, ctx, e.spellType, e.excludeSelf);
      if (n === 0) {
        pushLog(s, `${ctx.instance.card.name}: no qualifying ${e.spellType} spells, nothing happens.`);
        return;
      }
      const harm: Harm = e.kind === 'DamagePerSpell' ? 'damage' : e.kind === 'HealPerSpell' ? 'heal' : 'weaken';
      for (const t of await targetsFor(s, e, ctx)) applyAmount(s, ctx, t, harm, n);
      return;
    }
    case 'Heal': {
      for (const t of await targetsFor(s, e, ctx)) applyAmount(s, ctx, t, 'heal', e.value);
      return;
    }
    case 'Weaken': {
      for (const t of await targetsFor(s, e, ctx)) applyAmount(s, ctx, t, 'weaken', e.value);
      return;
    }
    case 'Bolster': {
      for (const t of await targetsFor(s, e, ctx)) {
        if (t.kind === 'Player') bolsterPlayer(s, ctx, t.player, e.value);
        else pushLog(s, `${describeTarget(s, t)} cannot be bolstered.`);
      }
      return;
    }
    case 'Advance': {
      for (const t of await targetsFor(s, e, ctx)) {
        // The per-round limit only caps a spell advancing itself
        if (t.kind === 'Instance') advanceInstance(s, t.instance, t.instance === ctx.instance ? e.limit : undefined);
        else pushLog(s, `${describeTarget(s, t)} is not a spell and cannot advance.`);
      }
      return;
    }
    case 'Cancel': {
      for (const t of await targetsFor(s, e, ctx)) {
        if (t.kind === 'Instance') cancelInstance(s, t.instance);
        else pushLog(s, `${describeTarget(s, t)} is not a spell and cannot be cancelled.`);
      }
      return;
    }
    case 'DiscardFromHand': {
      for (const t of await targetsFor(s, e, ctx)) {
        if (t.kind !== 'Player') continue;
        const p = player(s, t.player);
        let n = 0;
        while (n < e.value && p.hand.length > 0) {
          const idx = await askDiscard(s, p, p.hand.map((_, i) => i));
          const [card] = p.hand.splice(idx, 1);
          p.discard.push(card);
          pushLog(s, `${p.name} discards ${card.name}.`);
          n++;
        }
        if (n === 0) pushLog(s, `${p.name} has no cards to discard.`);
        else emit(s, 'CardsDiscarded', t.player, { ...sourceOf(ctx), value: n });
      }
      return;
    }
    case 'CastExtraSpell': {
      const caster = player(s, ctx.caster);
      for (let k = 0; k < (e.value ?? 1); k++) {
        if (caster.hand.length === 0) {
          pushLog(s, `${caster.name} has no spell left to cast.`);
          return;
        }
        const pick = await askCardToPlay(s, caster, caster.hand.map((_, i) => i));
        if (pick === null) {
          pushLog(s, `${caster.name} casts nothing extra.`);
          return;
        }
        const [card] = caster.hand.splice(pick, 1);
        const inst = makeInstance(s, card, caster.idx, 'active');
        slot(s, caster.idx, s.clash).push(inst);
        pushLog(s, `${caster.name} casts ${card.name} into Clash ${s.clash}.`);
        emit(s, 'ExtraSpellCast', caster.idx, { cardId: card.id, instanceId: inst.id });
        emit(s, 'SpellActive', caster.idx, { cardId: card.id, instanceId: inst.id });
        if (s.phase === 'RESOLVE') enqueue(s, inst);
        else pushLog(s, `${card.name} waits on the board; nothing resolves outside the resolve phase.`);
      }
      return;
    }
    case 'Recall': {
      for (const t of await targetsFor(s, e, ctx)) {
        if (t.kind !== 'Instance' || t.instance.owner !== ctx.caster) {
          pushLog(s, `${describeTarget(s, t)} cannot be recalled by ${player(s, ctx.caster).name}.`);
          continue;
        }
        removeFromBoard(s, t.instance);
        player(s, ctx.caster).hand.push(t.instance.card);
        pushLog(s, `${describeInstance(s, t.instance)} returns to hand.`);
        emit(s, 'SpellRecalled', ctx.caster, { cardId: t.instance.card.id, instanceId: t.instance.id });
      }
      return;
    }
    case 'PlayerChoice': {
      const legal = e.options.filter(o => hasTargets(s, o, ctx));
      if (legal.length === 0) {
        pushLog(s, `${ctx.instance.card.name}: no option has a legal target.`);
        return;
      }
      const caster = player(s, ctx.caster);
      const chosen = legal.length === 1 ? legal[0] : await askChoice(s, caster, legal, ctx.instance.card);
      pushLog(s, `${caster.name} chooses: ${effectToText(chosen)}`);
      await executeEffect(s, chosen, ctx);
      return;
    }
    case 'Sequence': {
      for (const step of e.steps) await executeEffect(s, step, ctx);
      return;
    }
    case 'Pass': {
      pushLog(s, `${ctx.instance.card.name} does nothing.`);
      return;
    }
    case 'Unknown': {
      pushLog(s, `${ctx.instance.card.name}: unrecognized effect ${e.raw} ignored.`);
      return;
    }
    default: exhaustive(e);
  }
}

// ---------------- Clause lists ----------------
// All-Always lists run in order; otherwise the first matching clause wins and Otherwise catches the rest
export async function executeClauses(s: GameState, clauses: readonly Clause[], ctx: ResolutionContext): Promise<void> {
  if (clauses.length === 0) return;
  if (clauses.every(c => c.when.kind === 'Always')) {
    for (const c of clauses) await executeEffect(s, c.do, ctx);
    return;
  }
  for (const c of clauses) {
    if (c.when.kind === 'Otherwise') {
      await executeEffect(s, c.do, ctx);
      return;
    }
    if (evaluateCondition(c.when, s, ctx.caster, ctx.instance)) {
      if (c.when.kind !== 'Always') ctx.instance.conditionMet = true;
      await executeEffect(s, c.do, ctx);
      return;
    }
  }
  pushLog(s, `${ctx.instance.card.name}: no condition was met.`);
}

// Advance clauses apply independently
export async function executeAdvanceClauses(s: GameState, clauses: readonly Clause[], ctx: ResolutionContext): Promise<void> {
  for (const c of clauses) {
    if (evaluateCondition(c.when, s, ctx.caster, ctx.instance)) await executeEffect(s, c.do, ctx);
  }
}
