// Decision source backed by a language model (Vercel AI SDK).
// Owns its own timeout and falls back to another seat whenever the model
// fails, times out, or answers outside the candidate set.

import { z } from 'zod';
import { generateObject, type LanguageModel } from 'ai';
import { openai } from '@ai-sdk/openai';
import { anthropic } from '@ai-sdk/anthropic';
import { google } from '@ai-sdk/google';

import type { CardDefinition, Effect } from './schema.ts';
import { cardToText, effectToText } from './ability-text-generator.ts';
import { type DecisionSource, HeuristicSeat } from './decisions.ts';
import {
  type GameState,
  type PlayedInstance,
  type PlayerState,
  type TargetRef,
  describeInstance,
  liveOnClash,
} from './state.ts';

export type LlmSeatOptions = {
  model?: LanguageModel;
  fallback?: DecisionSource;
  timeoutMs?: number;
  persona?: string; // appended to the system prompt
};

// Auto-select model based on available API keys
export function defaultModel(modelId?: string): LanguageModel {
  return process.env.ANTHROPIC_API_KEY
    ? anthropic(modelId || 'claude-sonnet-4-20250514')
    : process.env.GOOGLE_GENERATIVE_AI_API_KEY
    ? google(modelId || 'gemini-1.5-flash')
    : openai(modelId || 'gpt-4o-mini');
}

export const PickZ = z.object({
  index: z.number().int().min(0),
  reason: z.string().max(400).optional(),
});

const RULES_BRIEF = [
  'You are playing a turn-based card game. Each round has 4 clashes.',
  'In each clash every player secretly prepares one spell; then all spells are revealed and resolve in priority order (1 is fastest, A is slowest).',
  'Players have health and 3 trunks. Dropping to 0 health costs a trunk and makes you invulnerable for the rest of the round. Lose all trunks and you are out.',
  'Conjuries have no health; any damage or weaken cancels them.',
  'Answer with JSON only: {"index": <number>, "reason": <short string>}.',
].join('\n');

export function describeState(s: GameState, me: PlayerState): string {
  const lines: string[] = [`Round ${s.round}, Clash ${s.clash}. You are ${me.name}.`];
  for (const p of s.players) {
    lines.push(`${p.name}: ${p.health}/${p.maxHealth} health, ${p.trunks} trunk(s)${p.invulnerable ? ', invulnerable' : ''}.`);
  }
  const active = liveOnClash(s, s.clash);
  if (active.length) lines.push(`Active this clash: ${active.map(i => describeInstance(s, i)).join('; ')}.`);
  return lines.join('\n');
}

const numbered = (items: readonly string[]) => items.map((t, i) => `[${i}] ${t}`).join('\n');

export class LlmSeat implements DecisionSource {
  private readonly model: LanguageModel;
  private readonly fallback: DecisionSource;
  private readonly timeoutMs: number;
  private readonly system: string;
  readonly notes: string[] = []; // model reasons and failures, newest last

  constructor(opts: LlmSeatOptions = {}) {
    this.model = opts.model ?? defaultModel();
    this.fallback = opts.fallback ?? new HeuristicSeat();
    this.timeoutMs = opts.timeoutMs ?? 20_000;
    this.system = opts.persona ? `${RULES_BRIEF}\n${opts.persona}` : RULES_BRIEF;
  }

  // Index into a list of `size` options, or undefined when the model cannot be used
  private async pick(prompt: string, size: number): Promise<number | undefined> {
    try {
      const { object } = await generateObject({
        model: this.model,
        schema: PickZ,
        system: this.system,
        prompt,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });
      if (object.index >= size) {
        this.notes.push(`Model picked ${object.index} of ${size} options; falling back.`);
        return undefined;
      }
      if (object.reason) this.notes.push(object.reason);
      return object.index;
    } catch (err) {
      this.notes.push(`Model call failed: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }

  async chooseCardToPlay(p: PlayerState, s: GameState, legal: readonly number[]): Promise<number | null> {
    if (legal.length <= 1) return this.fallback.chooseCardToPlay(p, s, legal);
    const options = legal.map(i => cardToText(p.hand[i]).replace(/\n/g, ' | '));
    const prompt = `${describeState(s, p)}\n\nChoose the spell to prepare this clash:\n${numbered(options)}`;
    const idx = await this.pick(prompt, options.length);
    return idx === undefined ? this.fallback.chooseCardToPlay(p, s, legal) : legal[idx];
  }

  async makeChoice(options: readonly Effect[], caster: PlayerState, s: GameState, card: CardDefinition): Promise<Effect> {
    const prompt = `${describeState(s, caster)}\n\nYour ${card.name} asks you to choose one:\n${numbered(options.map(effectToText))}`;
    const idx = await this.pick(prompt, options.length);
    return idx === undefined ? this.fallback.makeChoice(options, caster, s, card) : options[idx];
  }

  async chooseDraftSet(p: PlayerState, s: GameState, sets: readonly (readonly CardDefinition[])[]): Promise<number> {
    if (sets.length <= 1) return this.fallback.chooseDraftSet(p, s, sets);
    const options = sets.map(set => `${set[0]?.set ?? '?'} (${set[0]?.element ?? '?'}): ${set.map(c => c.name).join(', ')}`);
    const prompt = `${describeState(s, p)}\n\nChoose a spell set to draft:\n${numbered(options)}`;
    const idx = await this.pick(prompt, options.length);
    return idx === undefined ? this.fallback.chooseDraftSet(p, s, sets) : idx;
  }

  chooseTarget(candidates: readonly TargetRef[], caster: PlayerState, s: GameState, effect: Effect) {
    return this.fallback.chooseTarget(candidates, caster, s, effect);
  }

  chooseCancellationTarget(candidates: readonly PlayedInstance[], caster: PlayerState, s: GameState) {
    return this.fallback.chooseCancellationTarget(candidates, caster, s);
  }

  orderSamePriority(instances: readonly PlayedInstance[], p: PlayerState, s: GameState) {
    return this.fallback.orderSamePriority(instances, p, s);
  }

  chooseCardToDiscard(p: PlayerState, s: GameState, legal: readonly number[]) {
    return this.fallback.chooseCardToDiscard(p, s, legal);
  }

  chooseCardsToKeep(p: PlayerState, s: GameState) {
    return this.fallback.chooseCardsToKeep(p, s);
  }

  chooseRecall(p: PlayerState, s: GameState, discardIndices: readonly number[], mandatory: boolean) {
    return this.fallback.chooseRecall(p, s, discardIndices, mandatory);
  }
}
