// Card ability text generator
// Converts card IR to human-readable English rules text

import type {
  CardDefinition,
  Clause,
  Condition,
  Effect,
  Priority,
  SpellFilter,
  Target,
} from './schema.ts';

// ---------------- Helpers ----------------
function spellsOf(filter: SpellFilter, count = 1): string {
  const kind = filter === 'any' ? '' : `${filter} `;
  if (count === 1) return `${/^[aeiou]/.test(kind) ? 'an' : 'a'} ${kind}spell`;
  return `${count} ${kind}spells`;
}

export function priorityToText(p: Priority): string {
  return p === 'A' ? 'Priority A (slowest)' : `Priority ${p}`;
}

export function targetToText(t: Target): string {
  switch (t.kind) {
    case 'Self': return 'you';
    case 'ThisSpell': return 'this spell';
    case 'Enemy': return 'an enemy';
    case 'EnemyOrConjury': return 'an enemy or enemy conjury';
    case 'AllEnemiesAndConjuries': return 'all enemies and their conjuries';
    case 'EachEnemy': return 'each enemy';
    case 'OtherFriendlyActive': return 'another of your active spells';
    case 'FriendlyPast': return 'one of your spells in a past clash';
    case 'EnemiesWithActive': return `each enemy with ${spellsOf(t.spellType, t.count ?? 1)} active`;
    case 'AnyActiveSpell': return 'any other active spell';
    case 'EnemyActiveSpell': return 'an enemy active spell';
    case 'EnemySpellsOfType': return t.spellType === 'any' ? 'all enemy active spells' : `all enemy ${t.spellType} spells`;
    default: { const _exhaustive: never = t; return _exhaustive; }
  }
}

export function conditionToText(c: Condition): string {
  switch (c.kind) {
    case 'Always': return '';
    case 'Otherwise': return 'Otherwise';
    case 'CasterHasActive':
      return `If you have ${spellsOf(c.spellType, c.count ?? 1)}${c.excludeSelf ? ' besides this one' : ''} active`;
    case 'EnemyHasActive':
      return `If ${c.perEnemy ? 'a single enemy has' : 'enemies have'} ${spellsOf(c.spellType, c.count ?? 1)} active`;
    case 'BoardHasActive':
      return `If there ${(c.count ?? 1) === 1 ? 'is' : 'are'} ${spellsOf(c.spellType, c.count ?? 1)}${c.excludeSelf ? ' besides this one' : ''} active`;
    case 'ResolvedEarlierThisRound':
      return (c.count ?? 1) === 1
        ? 'If this spell resolved in an earlier clash this round'
        : `If this spell resolved ${c.count} times in earlier clashes this round`;
    case 'AdvancedThisRound': return 'If this spell advanced this round';
    case 'ResolveConditionMet': return 'If this spell\'s condition was met';
    case 'ActiveInOtherClashes': return `If this spell was active in ${(c.count ?? 1)} or more other clashes this round`;
    case 'Not': {
      const inner = conditionToText(c.item);
      return inner.startsWith('If ') ? `Unless ${inner.slice(3)}` : `Unless ${inner}`;
    }
    case 'Unknown': return 'If (unreadable condition)';
    default: { const _exhaustive: never = c; return _exhaustive; }
  }
}

export function effectToText(e: Effect): string {
  switch (e.kind) {
    case 'Damage': return `Deal ${e.value} damage to ${targetToText(e.target)}.`;
    case 'DamageMulti': return `Deal ${e.value} damage to ${targetToText(e.target)}.`;
    case 'DamagePerSpell': return `Deal 1 damage to ${targetToText(e.target)} for each of your active ${e.spellType === 'any' ? '' : e.spellType + ' '}spells${e.excludeSelf ? ' besides this one' : ''}.`;
    case 'HealPerSpell': return `Heal ${targetToText(e.target)} 1 for each of your active ${e.spellType === 'any' ? '' : e.spellType + ' '}spells${e.excludeSelf ? ' besides this one' : ''}.`;
    case 'WeakenPerSpell': return `Weaken ${targetToText(e.target)} 1 for each of your active ${e.spellType === 'any' ? '' : e.spellType + ' '}spells${e.excludeSelf ? ' besides this one' : ''}.`;
    case 'Heal': return `Heal ${targetToText(e.target)} ${e.value}.`;
    case 'Weaken': return `Weaken ${targetToText(e.target)} ${e.value}.`;
    case 'Bolster': return `Bolster ${targetToText(e.target)} ${e.value}.`;
    case 'Advance': {
      const limit = e.limit != null ? ` (at most ${e.limit} time${e.limit === 1 ? '' : 's'} per round)` : '';
      return `Advance ${targetToText(e.target)}${limit}.`;
    }
    case 'Cancel': return `Cancel ${targetToText(e.target)}.`;
    case 'DiscardFromHand': return `${capitalize(targetToText(e.target))} discard${e.target.kind === 'Self' ? '' : 's'} ${e.value} card${e.value === 1 ? '' : 's'}.`;
    case 'CastExtraSpell': {
      const n = e.value ?? 1;
      return `Cast ${n === 1 ? 'a spell' : `${n} spells`} from your hand into this clash.`;
    }
    case 'Recall': return `Return ${targetToText(e.target)} to your hand.`;
    case 'PlayerChoice': return `Choose one: ${e.options.map(o => effectToText(o).replace(/\.$/, '')).join(' / ')}.`;
    case 'Sequence': return e.steps.map(effectToText).join(' Then ');
    case 'Pass': return 'Do nothing.';
    case 'Unknown': return '(unreadable effect)';
    default: { const _exhaustive: never = e; return _exhaustive; }
  }
}

function capitalize(s: string): string {
  return s.length ? s[0].toUpperCase() + s.slice(1) : s;
}

function clauseToText(c: Clause): string {
  const cond = conditionToText(c.when);
  const body = effectToText(c.do);
  if (!cond) return body;
  return `${cond}: ${body.length ? body[0].toLowerCase() + body.slice(1) : body}`;
}

export function cardToText(card: CardDefinition): string {
  const lines: string[] = [];
  const tags = [...card.types, ...(card.conjury ? ['conjury'] : [])].join(', ');
  lines.push(`${card.name} [${card.element}] ${priorityToText(card.priority)}${tags ? ` (${tags})` : ''}`);
  const limits: string[] = [];
  if (card.notFirst) limits.push('cannot be played in the first clash');
  if (card.notLast) limits.push('cannot be played in the last clash');
  if (limits.length) lines.push(capitalize(limits.join('; ')) + '.');
  if (card.resolve.length) lines.push(`Resolve: ${card.resolve.map(clauseToText).join(' ')}`);
  if (card.advance.length) lines.push(`Advance: ${card.advance.map(clauseToText).join(' ')}`);
  return lines.join('\n');
}
