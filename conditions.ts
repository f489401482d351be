// Condition evaluator: pure reads over the current clash slot and the round's event log

import type { Condition } from './schema.ts';
import { walkCondition } from './analysis.ts';
import {
  type EventType,
  type GameState,
  type PlayedInstance,
  type PlayerIndex,
  countLive,
  exhaustive,
  liveOnClash,
} from './state.ts';

const ACTIVITY: ReadonlySet<EventType> = new Set<EventType>(['SpellActive', 'SpellResolved', 'SpellAdvanced']);

function hasUnknown(c: Condition): boolean {
  let found = false;
  walkCondition(c, n => { if (n.kind === 'Unknown') found = true; });
  return found;
}

export function evaluateCondition(c: Condition, s: GameState, caster: PlayerIndex, instance: PlayedInstance): boolean {
  switch (c.kind) {
    case 'Always': return true;
    // Else-branch marker; meaningful only to the clause walker
    case 'Otherwise': return false;
    case 'CasterHasActive': {
      const mine = liveOnClash(s, s.clash, caster);
      return countLive(mine, c.spellType, c.excludeSelf ? instance : undefined) >= (c.count ?? 1);
    }
    case 'EnemyHasActive': {
      const need = c.count ?? 1;
      const counts = s.players
        .filter(p => p.idx !== caster)
        .map(p => countLive(liveOnClash(s, s.clash, p.idx), c.spellType));
      if (c.perEnemy) return counts.some(n => n >= need);
      return counts.reduce((a, b) => a + b, 0) >= need;
    }
    case 'BoardHasActive':
      return countLive(liveOnClash(s, s.clash), c.spellType, c.excludeSelf ? instance : undefined) >= (c.count ?? 1);
    case 'ResolvedEarlierThisRound': {
      const n = s.events.filter(e =>
        e.type === 'SpellResolved' && e.player === caster && e.cardId === instance.card.id && e.clash < s.clash,
      ).length;
      return n >= (c.count ?? 1);
    }
    case 'AdvancedThisRound': return instance.advances > 0;
    case 'ResolveConditionMet': return instance.conditionMet;
    // Distinct clashes of this round, other than the current one, where this instance was on the board
    case 'ActiveInOtherClashes': {
      const clashes = new Set(
        s.events
          .filter(e => e.round === s.round && e.instanceId === instance.id && e.clash !== s.clash && ACTIVITY.has(e.type))
          .map(e => e.clash),
      );
      return clashes.size >= (c.count ?? 1);
    }
    // A negated malformed node stays false
    case 'Not': return hasUnknown(c.item) ? false : !evaluateCondition(c.item, s, caster, instance);
    case 'Unknown': return false;
    default: return exhaustive(c);
  }
}
