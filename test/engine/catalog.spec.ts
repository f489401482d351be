import type { TestCase } from './harness.ts';
import { always, damage, findInstance, mkSpell, otherwise, when } from './harness.ts';
import { buildCatalog, extendCatalog, getCatalog } from '../../catalog.ts';
import { analyzeCard, analyzeGlobal } from '../../analysis.ts';
import { CORE_RULES } from '../../core-rules.ts';
import { analyzeRules } from '../../rules-verifier.ts';
import { cardToText } from '../../ability-text-generator.ts';
import { InvariantViolation, removeFromBoard, requireLocation } from '../../state.ts';

const record = (id: string, extra: Record<string, unknown> = {}) => ({
  id,
  name: id,
  set: 'Probe',
  element: 'fire',
  priority: 2,
  types: ['attack'],
  resolve: [{ when: { kind: 'Always' }, do: { kind: 'Damage', target: { kind: 'Enemy' }, value: 1 } }],
  ...extra,
});

const codes = (issues: readonly { code: string }[]) => issues.map(i => i.code);
const expectCodes = (got: readonly { code: string }[], want: string[]) =>
  want.filter(c => !codes(got).includes(c)).map(c => `missing issue ${c}; got [${codes(got).join(', ')}]`);

export const cases: TestCase[] = [
  {
    name: 'The shipped catalog loads six complete sets without errors',
    pre: {},
    actions: [],
    expect: {
      verify: () => {
        const c = getCatalog();
        const errors: string[] = [];
        if (c.cards.size !== 24) errors.push(`${c.cards.size} cards`);
        if (c.sets.size !== 6) errors.push(`${c.sets.size} sets`);
        const bad = c.issues.filter(i => i.level === 'error');
        if (bad.length) errors.push(`catalog errors: ${codes(bad).join(', ')}`);
        const global = analyzeGlobal([...c.cards.values()], CORE_RULES.players.startingHand);
        if (global.issues.length) errors.push(`global issues: ${codes(global.issues).join(', ')}`);
        return errors;
      },
    },
  },
  {
    name: 'Invalid records are reported and skipped while unknown effects load as no-ops',
    pre: {},
    actions: [],
    expect: {
      verify: () => {
        const c = buildCatalog([
          record('ok'),
          record('too-slow', { priority: 7 }),
          record('ok'),
          record('odd', { resolve: [{ when: { kind: 'Moon' }, do: { kind: 'Explode', value: 3 } }] }),
        ]);
        const errors: string[] = [];
        if ([...c.cards.keys()].join(',') !== 'ok,odd') errors.push(`loaded [${[...c.cards.keys()].join(',')}]`);
        const invalid = c.issues.find(i => i.code === 'CARD_INVALID');
        if (!invalid?.path?.includes('priority')) errors.push('CARD_INVALID does not point at priority');
        const dup = c.issues.find(i => i.code === 'DUPLICATE_ID');
        if (dup?.cardId !== 'ok') errors.push('duplicate id not reported for ok');
        const clause = c.cards.get('odd')?.resolve[0];
        const effect = clause?.do;
        if (effect?.kind !== 'Unknown' || effect.raw !== '{"kind":"Explode","value":3}') errors.push('effect did not load as Unknown');
        if (clause?.when.kind !== 'Unknown') errors.push('condition did not load as Unknown');
        errors.push(...expectCodes(c.issues.filter(i => i.cardId === 'odd'), ['UNKNOWN_EFFECT', 'UNKNOWN_CONDITION']));
        return errors;
      },
    },
  },
  {
    name: 'Loaded definitions are deeply frozen',
    pre: {},
    actions: [],
    expect: {
      verify: () => {
        const card = getCatalog().cards.get('riptide');
        if (!card) return ['riptide missing'];
        const frozen = [card, card.types, card.resolve, card.resolve[0], card.resolve[0]?.do, card.advance[0]?.do].every(Object.isFrozen);
        return frozen ? [] : ['a nested part of riptide is mutable'];
      },
    },
  },
  {
    name: 'Extending a catalog leaves the base untouched',
    pre: {},
    actions: [],
    expect: {
      verify: () => {
        const base = getCatalog();
        const ext = extendCatalog(base, [mkSpell('extra', { set: 'Cinder' })]);
        const errors: string[] = [];
        if (base.cards.has('extra')) errors.push('base gained a card');
        if (base.sets.get('Cinder')?.length !== 4) errors.push('base Cinder set changed');
        if (ext.sets.get('Cinder')?.length !== 5) errors.push('extended Cinder set is not 5 cards');
        return errors;
      },
    },
  },
  {
    name: 'Clause-order mistakes are flagged by card analysis',
    pre: {},
    actions: [],
    expect: {
      verify: () => [
        ...expectCodes(analyzeCard(mkSpell('a', { resolve: [otherwise(damage(1)), always(damage(1))] })).issues, ['OTHERWISE_FIRST']),
        ...expectCodes(
          analyzeCard(mkSpell('b', {
            resolve: [when({ kind: 'EnemyHasActive', spellType: 'attack' }, damage(1)), otherwise(damage(1)), always(damage(1))],
          })).issues,
          ['OTHERWISE_NOT_LAST'],
        ),
        ...expectCodes(
          analyzeCard(mkSpell('c', { advance: [always({ kind: 'Advance', target: { kind: 'ThisSpell' } })] })).issues,
          ['SELF_ADVANCE_UNBOUNDED'],
        ),
        ...(analyzeCard(mkSpell('d', { priority: 'A', advance: [always({ kind: 'Advance', target: { kind: 'ThisSpell' } })] })).issues.length
          ? ['an A-priority self-advance was flagged']
          : []),
      ],
    },
  },
  {
    name: 'The core ruleset is consistent and a broken one is reported at match creation',
    pre: { rules: { ...CORE_RULES, clashes: { clashesPerRound: 4, slowestPriority: 5 } } },
    actions: [],
    expect: {
      logIncludes: ['[RulesVerifier] Errors: SLOWEST_NOT_LAST'],
      verify: () => {
        const core = analyzeRules(CORE_RULES);
        return core.issues.length ? [`core rules report ${codes(core.issues).join(', ')}`] : [];
      },
    },
  },
  {
    name: 'Looking up an instance that left the board is an invariant violation',
    pre: { cards: [mkSpell('gone')], instances: [{ id: 'G', card: 'gone', owner: 0, clash: 1 }] },
    actions: [],
    expect: {
      verify: s => {
        const g = findInstance(s, 'G');
        if (!g) return ['G missing'];
        removeFromBoard(s, g);
        try {
          requireLocation(s, g);
          return ['requireLocation accepted a removed instance'];
        } catch (e) {
          return e instanceof InvariantViolation ? [] : [`unexpected error ${String(e)}`];
        }
      },
    },
  },
  {
    name: 'Rules text is generated from the card definition',
    pre: {},
    actions: [],
    expect: {
      verify: () => {
        const c = getCatalog();
        const want: Array<[string, string]> = [
          ['cinder-bolt', 'Cinder Bolt [fire] Priority 2 (attack)\nResolve: Deal 2 damage to an enemy.'],
          [
            'veil',
            'Veil [shadow] Priority 1 (response)\nResolve: Unless enemies have an attack spell active: heal you 1. Otherwise: cancel all enemy attack spells.',
          ],
          [
            'riptide',
            'Riptide [water] Priority 4 (attack)\nResolve: If this spell resolved in an earlier clash this round: deal 3 damage to an enemy. Otherwise: deal 1 damage to an enemy.\nAdvance: Advance this spell (at most 1 time per round).',
          ],
        ];
        return want.flatMap(([id, text]) => {
          const card = c.cards.get(id);
          const got = card ? cardToText(card) : '(missing)';
          return got === text ? [] : [`${id}: got ${JSON.stringify(got)}`];
        });
      },
    },
  },
];

export default cases;
