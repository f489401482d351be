// Target resolver: declarative specifier -> concrete players and instances

import type { Effect, Target } from './schema.ts';
import { matchesFilter } from './schema.ts';
import { askCancellation, askTarget } from './decisions.ts';
import {
  type GameState,
  type PlayedInstance,
  type PlayerIndex,
  type TargetRef,
  countLive,
  exhaustive,
  isLive,
  liveOnClash,
  locate,
  player,
  validEnemies,
} from './state.ts';

export type ResolutionContext = { caster: PlayerIndex; instance: PlayedInstance };

const asPlayer = (pid: PlayerIndex): TargetRef => ({ kind: 'Player', player: pid });
const asInstance = (instance: PlayedInstance): TargetRef => ({ kind: 'Instance', instance });

function enemyConjuries(s: GameState, caster: PlayerIndex): PlayedInstance[] {
  return validEnemies(s, caster).flatMap(p => liveOnClash(s, s.clash, p.idx).filter(i => i.card.conjury));
}

function enemyInstances(s: GameState, caster: PlayerIndex): PlayedInstance[] {
  return liveOnClash(s, s.clash).filter(i => i.owner !== caster);
}

// Every legal target, without asking anyone
export function targetCandidates(s: GameState, t: Target, ctx: ResolutionContext): TargetRef[] {
  switch (t.kind) {
    case 'Self': return [asPlayer(ctx.caster)];
    case 'ThisSpell': return locate(s, ctx.instance) && isLive(ctx.instance) ? [asInstance(ctx.instance)] : [];
    case 'Enemy':
    case 'EachEnemy':
      return validEnemies(s, ctx.caster).map(p => asPlayer(p.idx));
    case 'EnemyOrConjury':
    case 'AllEnemiesAndConjuries':
      return [
        ...validEnemies(s, ctx.caster).map(p => asPlayer(p.idx)),
        ...enemyConjuries(s, ctx.caster).map(asInstance),
      ];
    case 'OtherFriendlyActive':
      return liveOnClash(s, s.clash, ctx.caster).filter(i => i !== ctx.instance).map(asInstance);
    case 'FriendlyPast':
      return player(s, ctx.caster).board
        .slice(0, s.clash - 1)
        .flatMap(arr => arr.filter(isLive))
        .map(asInstance);
    case 'EnemiesWithActive':
      return validEnemies(s, ctx.caster)
        .filter(p => countLive(liveOnClash(s, s.clash, p.idx), t.spellType) >= (t.count ?? 1))
        .map(p => asPlayer(p.idx));
    case 'AnyActiveSpell':
      return liveOnClash(s, s.clash).filter(i => i !== ctx.instance).map(asInstance);
    case 'EnemyActiveSpell':
      return enemyInstances(s, ctx.caster).map(asInstance);
    case 'EnemySpellsOfType':
      return enemyInstances(s, ctx.caster).filter(i => matchesFilter(i.card, t.spellType)).map(asInstance);
    default: return exhaustive(t);
  }
}

export function isPrompted(t: Target): boolean {
  switch (t.kind) {
    case 'Enemy':
    case 'EnemyOrConjury':
    case 'OtherFriendlyActive':
    case 'FriendlyPast':
    case 'AnyActiveSpell':
    case 'EnemyActiveSpell':
      return true;
    default:
      return false;
  }
}

// Prompted specifiers narrow to one target; an empty result is a legal no-target state
export async function resolveTargets(s: GameState, t: Target, ctx: ResolutionContext, effect: Effect): Promise<TargetRef[]> {
  const candidates = targetCandidates(s, t, ctx);
  if (!isPrompted(t) || candidates.length <= 1) return candidates;
  const caster = player(s, ctx.caster);
  const instances = candidates.flatMap(c => (c.kind === 'Instance' ? [c.instance] : []));
  if (effect.kind === 'Cancel' && instances.length === candidates.length) {
    return [asInstance(await askCancellation(s, caster, instances))];
  }
  return [await askTarget(s, caster, candidates, effect)];
}
