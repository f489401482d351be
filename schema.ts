// Schema and types for spell cards and their effect IR
// Pure type/Zod module: no Node or AI SDK dependencies

import { z } from 'zod';

// ----------------------------- Global Bounds -----------------------------
export const MAX_CLAUSES = 4; // resolve/advance lists
export const MAX_CHOICE_OPTIONS = 4;
export const MAX_SEQUENCE_STEPS = 6;
export const MAX_EFFECT_VALUE = 10;

// ----------------------------- Primitive Types -----------------------------
export const SpellTypeZ = z.enum(['attack', 'remedy', 'response', 'boost']);
export type SpellType = z.infer<typeof SpellTypeZ>;

export const SpellFilterZ = z.union([SpellTypeZ, z.literal('any')]);
export type SpellFilter = z.infer<typeof SpellFilterZ>;

// 'A' is the slowest priority; such spells usually relocate themselves via advance clauses
export const PriorityZ = z.union([z.number().int().min(1).max(5), z.literal('A')]);
export type Priority = z.infer<typeof PriorityZ>;

const CountZ = z.number().int().min(1).max(8);
const AmountZ = z.number().int().min(0).max(MAX_EFFECT_VALUE);

// ----------------------------- Conditions (recursive) -----------------------------
export type CondAlways = { kind: 'Always' };
export type CondOtherwise = { kind: 'Otherwise' };
export type CondCasterHasActive = { kind: 'CasterHasActive'; spellType: SpellFilter; count?: number; excludeSelf?: boolean };
export type CondEnemyHasActive = { kind: 'EnemyHasActive'; spellType: SpellFilter; count?: number; perEnemy?: boolean };
export type CondBoardHasActive = { kind: 'BoardHasActive'; spellType: SpellFilter; count?: number; excludeSelf?: boolean };
export type CondResolvedEarlierThisRound = { kind: 'ResolvedEarlierThisRound'; count?: number };
export type CondAdvancedThisRound = { kind: 'AdvancedThisRound' };
export type CondResolveConditionMet = { kind: 'ResolveConditionMet' };
export type CondActiveInOtherClashes = { kind: 'ActiveInOtherClashes'; count?: number };
export type CondNot = { kind: 'Not'; item: Condition };
export type CondUnknown = { kind: 'Unknown'; raw: string };

export type Condition =
  | CondAlways
  | CondOtherwise
  | CondCasterHasActive
  | CondEnemyHasActive
  | CondBoardHasActive
  | CondResolvedEarlierThisRound
  | CondAdvancedThisRound
  | CondResolveConditionMet
  | CondActiveInOtherClashes
  | CondNot
  | CondUnknown;

export const ConditionZ: z.ZodType<Condition> = z.lazy(() => z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('Always') }),
  z.object({ kind: z.literal('Otherwise') }),
  z.object({ kind: z.literal('CasterHasActive'), spellType: SpellFilterZ, count: CountZ.optional(), excludeSelf: z.boolean().optional() }),
  z.object({ kind: z.literal('EnemyHasActive'), spellType: SpellFilterZ, count: CountZ.optional(), perEnemy: z.boolean().optional() }),
  z.object({ kind: z.literal('BoardHasActive'), spellType: SpellFilterZ, count: CountZ.optional(), excludeSelf: z.boolean().optional() }),
  z.object({ kind: z.literal('ResolvedEarlierThisRound'), count: CountZ.optional() }),
  z.object({ kind: z.literal('AdvancedThisRound') }),
  z.object({ kind: z.literal('ResolveConditionMet') }),
  z.object({ kind: z.literal('ActiveInOtherClashes'), count: CountZ.optional() }),
  z.object({ kind: z.literal('Not'), item: ConditionZ }),
  z.object({ kind: z.literal('Unknown'), raw: z.string() }),
]));

// ----------------------------- Targets -----------------------------
export type Target =
  | { kind: 'Self' }
  | { kind: 'ThisSpell' }
  | { kind: 'Enemy' }
  | { kind: 'EnemyOrConjury' }
  | { kind: 'AllEnemiesAndConjuries' }
  | { kind: 'EachEnemy' }
  | { kind: 'OtherFriendlyActive' }
  | { kind: 'FriendlyPast' }
  | { kind: 'EnemiesWithActive'; spellType: SpellFilter; count?: number }
  | { kind: 'AnyActiveSpell' }
  | { kind: 'EnemyActiveSpell' }
  | { kind: 'EnemySpellsOfType'; spellType: SpellFilter };

export const TargetZ: z.ZodType<Target> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('Self') }),
  z.object({ kind: z.literal('ThisSpell') }),
  z.object({ kind: z.literal('Enemy') }),
  z.object({ kind: z.literal('EnemyOrConjury') }),
  z.object({ kind: z.literal('AllEnemiesAndConjuries') }),
  z.object({ kind: z.literal('EachEnemy') }),
  z.object({ kind: z.literal('OtherFriendlyActive') }),
  z.object({ kind: z.literal('FriendlyPast') }),
  z.object({ kind: z.literal('EnemiesWithActive'), spellType: SpellFilterZ, count: CountZ.optional() }),
  z.object({ kind: z.literal('AnyActiveSpell') }),
  z.object({ kind: z.literal('EnemyActiveSpell') }),
  z.object({ kind: z.literal('EnemySpellsOfType'), spellType: SpellFilterZ }),
]);
export type TargetKind = Target['kind'];

// ----------------------------- Effects (recursive) -----------------------------
// Strongly-typed discriminated union for compile-time exhaustiveness
export type Damage = { kind: 'Damage'; target: Target; value: number };
export type DamageMulti = { kind: 'DamageMulti'; target: Target; value: number };
export type DamagePerSpell = { kind: 'DamagePerSpell'; target: Target; spellType: SpellFilter; excludeSelf?: boolean };
export type HealPerSpell = { kind: 'HealPerSpell'; target: Target; spellType: SpellFilter; excludeSelf?: boolean };
export type WeakenPerSpell = { kind: 'WeakenPerSpell'; target: Target; spellType: SpellFilter; excludeSelf?: boolean };
export type Heal = { kind: 'Heal'; target: Target; value: number };
export type Weaken = { kind: 'Weaken'; target: Target; value: number };
export type Bolster = { kind: 'Bolster'; target: Target; value: number };
export type Advance = { kind: 'Advance'; target: Target; limit?: number };
export type Cancel = { kind: 'Cancel'; target: Target };
export type DiscardFromHand = { kind: 'DiscardFromHand'; target: Target; value: number };
export type CastExtraSpell = { kind: 'CastExtraSpell'; value?: number };
export type Recall = { kind: 'Recall'; target: Target };
export type PlayerChoice = { kind: 'PlayerChoice'; options: Effect[] };
export type Sequence = { kind: 'Sequence'; steps: Effect[] };
export type Pass = { kind: 'Pass' };
export type UnknownEffect = { kind: 'Unknown'; raw: string };

export type Effect =
  | Damage | DamageMulti | DamagePerSpell | HealPerSpell | WeakenPerSpell
  | Heal | Weaken | Bolster
  | Advance | Cancel | DiscardFromHand | CastExtraSpell | Recall
  | PlayerChoice | Sequence | Pass
  | UnknownEffect;

export type EffectKind = Effect['kind'];

const PerSpellShape = { target: TargetZ, spellType: SpellFilterZ, excludeSelf: z.boolean().optional() };

// recursive: PlayerChoice, Sequence
export const EffectZ: z.ZodType<Effect> = z.lazy(() => z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('Damage'), target: TargetZ, value: AmountZ }),
  z.object({ kind: z.literal('DamageMulti'), target: TargetZ, value: AmountZ }),
  z.object({ kind: z.literal('DamagePerSpell'), ...PerSpellShape }),
  z.object({ kind: z.literal('HealPerSpell'), ...PerSpellShape }),
  z.object({ kind: z.literal('WeakenPerSpell'), ...PerSpellShape }),
  z.object({ kind: z.literal('Heal'), target: TargetZ, value: AmountZ }),
  z.object({ kind: z.literal('Weaken'), target: TargetZ, value: AmountZ }),
  z.object({ kind: z.literal('Bolster'), target: TargetZ, value: AmountZ }),
  z.object({ kind: z.literal('Advance'), target: TargetZ, limit: CountZ.optional() }),
  z.object({ kind: z.literal('Cancel'), target: TargetZ }),
  z.object({ kind: z.literal('DiscardFromHand'), target: TargetZ, value: AmountZ }),
  z.object({ kind: z.literal('CastExtraSpell'), value: CountZ.optional() }),
  z.object({ kind: z.literal('Recall'), target: TargetZ }),
  z.object({ kind: z.literal('PlayerChoice'), options: z.array(EffectZ).min(2).max(MAX_CHOICE_OPTIONS) }),
  z.object({ kind: z.literal('Sequence'), steps: z.array(EffectZ).min(1).max(MAX_SEQUENCE_STEPS) }),
  z.object({ kind: z.literal('Pass') }),
  z.object({ kind: z.literal('Unknown'), raw: z.string() }),
]));

// Malformed nodes fail closed instead of rejecting the whole card
const rawText = (input: unknown): string => JSON.stringify(input) ?? String(input);
export const LenientConditionZ = ConditionZ.catch((ctx): Condition => ({ kind: 'Unknown', raw: rawText(ctx.input) }));
export const LenientEffectZ = EffectZ.catch((ctx): Effect => ({ kind: 'Unknown', raw: rawText(ctx.input) }));

export type Clause = { when: Condition; do: Effect };
export const ClauseZ = z.object({ when: LenientConditionZ, do: LenientEffectZ });

// ----------------------------- Card -----------------------------
export const CardZ = z.object({
  id: z.string().min(1).max(48),
  name: z.string().min(1).max(48),
  set: z.string().min(1).max(48),
  element: z.string().min(1).max(24),
  priority: PriorityZ,
  types: z.array(SpellTypeZ).max(4),
  conjury: z.boolean().default(false),
  notFirst: z.boolean().default(false),
  notLast: z.boolean().default(false),
  resolve: z.array(ClauseZ).max(MAX_CLAUSES),
  advance: z.array(ClauseZ).max(MAX_CLAUSES).default([]),
  flavor: z.string().max(200).optional(),
});

export type CardDefinition = {
  readonly id: string;
  readonly name: string;
  readonly set: string;
  readonly element: string;
  readonly priority: Priority;
  readonly types: readonly SpellType[];
  readonly conjury: boolean;
  readonly notFirst: boolean;
  readonly notLast: boolean;
  readonly resolve: readonly Clause[];
  readonly advance: readonly Clause[];
  readonly flavor?: string;
};

export const CatalogFileZ = z.object({
  version: z.number().int().min(1),
  cards: z.array(z.unknown()),
});
export type CatalogFile = z.infer<typeof CatalogFileZ>;

export function matchesFilter(card: CardDefinition, filter: SpellFilter): boolean {
  return filter === 'any' || card.types.includes(filter);
}
