// Card catalog: validated once from data/spells.json, frozen, shared by reference

import { readFileSync } from 'node:fs';
import { CardZ, CatalogFileZ, type CardDefinition } from './schema.ts';
import { analyzeCard, type AnalysisIssue } from './analysis.ts';

export type CatalogIssue = AnalysisIssue & { cardId?: string };

export type Catalog = {
  readonly cards: ReadonlyMap<string, CardDefinition>;
  readonly sets: ReadonlyMap<string, readonly CardDefinition[]>;
  readonly issues: readonly CatalogIssue[];
};

const DEFAULT_CATALOG_URL = new URL('./data/spells.json', import.meta.url);

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

// Builds a catalog from raw records; a bad record is reported and skipped
export function buildCatalog(records: readonly unknown[]): Catalog {
  const cards = new Map<string, CardDefinition>();
  const sets = new Map<string, CardDefinition[]>();
  const issues: CatalogIssue[] = [];

  records.forEach((raw, i) => {
    const parsed = CardZ.safeParse(raw);
    if (!parsed.success) {
      for (const e of parsed.error.issues) {
        issues.push({ level: 'error', code: 'CARD_INVALID', message: `Card #${i}: ${e.message}`, path: e.path.map(String) });
      }
      return;
    }
    const card: CardDefinition = deepFreeze(parsed.data);
    if (cards.has(card.id)) {
      issues.push({ level: 'error', code: 'DUPLICATE_ID', message: `Duplicate card id ${card.id}`, cardId: card.id });
      return;
    }
    for (const issue of analyzeCard(card).issues) issues.push({ ...issue, cardId: card.id });
    cards.set(card.id, card);
    const group = sets.get(card.set);
    if (group) group.push(card);
    else sets.set(card.set, [card]);
  });

  for (const group of sets.values()) Object.freeze(group);
  return { cards, sets, issues };
}

export function loadCatalogFile(url: URL | string): Catalog {
  const json: unknown = JSON.parse(readFileSync(url, 'utf8'));
  const file = CatalogFileZ.parse(json);
  return buildCatalog(file.cards);
}

// Lazily initialized registry; every match shares the same definitions
let shared: Catalog | undefined;

export function getCatalog(): Catalog {
  if (!shared) shared = loadCatalogFile(DEFAULT_CATALOG_URL);
  return shared;
}

// Catalog with extra cards layered over a base; the base is left untouched
export function extendCatalog(base: Catalog, extra: readonly CardDefinition[]): Catalog {
  const cards = new Map(base.cards);
  const sets = new Map<string, readonly CardDefinition[]>(base.sets);
  for (const card of extra) {
    cards.set(card.id, card);
    sets.set(card.set, [...(sets.get(card.set) ?? []).filter(c => c.id !== card.id), card]);
  }
  return { cards, sets, issues: base.issues };
}

export function cardById(catalog: Catalog, id: string): CardDefinition {
  const card = catalog.cards.get(id);
  if (!card) throw new Error(`Unknown card id: ${id}`);
  return card;
}
