#!/usr/bin/env tsx
// Simple CLI to play a match against heuristic seats using engine.ts and CORE_RULES

import readline, { type Interface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';

import type { CardDefinition, Effect } from './schema.ts';
import { cardToText, effectToText } from './ability-text-generator.ts';
import { type DecisionSource, HeuristicSeat } from './decisions.ts';
import { createMatch, runMatch, snapshotPublic } from './engine.ts';
import {
  type GameState,
  type PlayedInstance,
  type PlayerState,
  type TargetRef,
  describeInstance,
  describeTarget,
} from './state.ts';

class QuitRequested extends Error {}

function printHelp() {
  console.log(
`At any prompt:
  <n>                    Pick option n
  status                 Show health, trunks and public boards
  hand                   Show your hand with rules text
  help                   Show this help
  quit                   Exit
`);
}

function printStatus(s: GameState) {
  const pub = snapshotPublic(s);
  console.log(`\nRound ${pub.round}, Clash ${pub.clash} (${pub.phase})`);
  for (const p of pub.players) {
    console.log(`${p.name}  ${p.health}/${p.maxHealth} health, ${p.trunks} trunk(s)${p.invulnerable ? ', invulnerable' : ''}, hand ${p.hand}, discard ${p.discard}`);
    p.board.forEach((slot, i) => { if (slot.length) console.log(`  Clash ${i + 1}: ${slot.join(', ')}`); });
  }
  console.log('');
}

// Prompts on stdin; prints new log lines before every question
class HumanSeat implements DecisionSource {
  private seen = 0;

  constructor(private readonly rl: Interface) {}

  private flush(s: GameState) {
    for (const line of s.log.slice(this.seen)) console.log(line);
    this.seen = s.log.length;
  }

  private async ask(s: GameState, me: PlayerState, question: string): Promise<string> {
    this.flush(s);
    for (;;) {
      const line = (await this.rl.question(question)).trim();
      if (line === 'quit' || line === 'exit') throw new QuitRequested();
      if (line === 'help' || line === 'h') { printHelp(); continue; }
      if (line === 'status' || line === 'st') { printStatus(s); continue; }
      if (line === 'hand') {
        console.log(me.hand.map((c, i) => `${i}: ${cardToText(c)}`).join('\n') || '(empty)');
        continue;
      }
      return line;
    }
  }

  private async pickIndex(s: GameState, me: PlayerState, title: string, options: readonly string[], allowBlank = false): Promise<number | null> {
    console.log(`\n${title}`);
    options.forEach((o, i) => console.log(`  ${i}: ${o}`));
    for (;;) {
      const line = await this.ask(s, me, allowBlank ? '> (blank to skip) ' : '> ');
      if (!line && allowBlank) return null;
      const n = Number(line);
      if (line && Number.isInteger(n) && n >= 0 && n < options.length) return n;
      console.log('Invalid choice.');
    }
  }

  private async pickRequired(s: GameState, me: PlayerState, title: string, options: readonly string[]): Promise<number> {
    return (await this.pickIndex(s, me, title, options)) ?? 0;
  }

  async chooseCardToPlay(p: PlayerState, s: GameState, legal: readonly number[]): Promise<number | null> {
    const i = await this.pickIndex(s, p, `Clash ${s.clash}: prepare a spell`, legal.map(n => cardToText(p.hand[n]).replace(/\n/g, ' | ')), true);
    return i === null ? null : legal[i];
  }

  async makeChoice(options: readonly Effect[], caster: PlayerState, s: GameState, card: CardDefinition): Promise<Effect> {
    return options[await this.pickRequired(s, caster, `${card.name}: choose one`, options.map(effectToText))];
  }

  async chooseTarget(candidates: readonly TargetRef[], caster: PlayerState, s: GameState, effect: Effect): Promise<TargetRef> {
    return candidates[await this.pickRequired(s, caster, `Target for: ${effectToText(effect)}`, candidates.map(t => describeTarget(s, t)))];
  }

  async chooseCancellationTarget(candidates: readonly PlayedInstance[], caster: PlayerState, s: GameState): Promise<PlayedInstance> {
    return candidates[await this.pickRequired(s, caster, 'Spell to cancel', candidates.map(i => describeInstance(s, i)))];
  }

  async orderSamePriority(instances: readonly PlayedInstance[], p: PlayerState, s: GameState): Promise<readonly PlayedInstance[]> {
    const remaining = [...instances];
    const order: PlayedInstance[] = [];
    while (remaining.length > 1) {
      const i = await this.pickRequired(s, p, 'Resolve which of your equal-priority spells next?', remaining.map(r => r.card.name));
      order.push(...remaining.splice(i, 1));
    }
    return [...order, ...remaining];
  }

  async chooseCardToDiscard(p: PlayerState, s: GameState, legal: readonly number[]): Promise<number> {
    return legal[await this.pickRequired(s, p, 'Discard a card', legal.map(n => p.hand[n].name))];
  }

  async chooseCardsToKeep(p: PlayerState, s: GameState): Promise<readonly number[]> {
    console.log('\nEnd of round. Your hand:');
    p.hand.forEach((c, i) => console.log(`  ${i}: ${c.name}`));
    for (;;) {
      const line = await this.ask(s, p, 'Keep which cards? (comma-separated, blank keeps all) ');
      if (!line) return p.hand.map((_, i) => i);
      const picks = line.split(',').map(x => Number(x.trim()));
      if (picks.every(n => Number.isInteger(n) && n >= 0 && n < p.hand.length)) return [...new Set(picks)];
      console.log('Invalid selection.');
    }
  }

  async chooseRecall(p: PlayerState, s: GameState, discardIndices: readonly number[], mandatory: boolean): Promise<number | null> {
    const i = await this.pickIndex(s, p, `Recall a card (${p.hand.length} in hand)`, discardIndices.map(n => p.discard[n].name), !mandatory);
    return i === null ? null : discardIndices[i];
  }

  async chooseDraftSet(p: PlayerState, s: GameState, sets: readonly (readonly CardDefinition[])[]): Promise<number> {
    return this.pickRequired(s, p, 'Draft a set', sets.map(set => `${set[0]?.set ?? '?'}: ${set.map(c => c.name).join(', ')}`));
  }

  finish(s: GameState) {
    this.flush(s);
  }
}

async function main() {
  const opponents = Math.max(1, Number(process.argv[2] ?? 1));
  const seed = Number(process.argv[3] ?? Date.now() % 100000);
  const rl = readline.createInterface({ input, output });
  const human = new HumanSeat(rl);
  printHelp();

  const s = createMatch(
    [{ name: 'You', seat: human }, ...Array.from({ length: opponents }, (_, i) => ({ name: `Bot ${i + 1}`, seat: new HeuristicSeat() }))],
    { seed },
  );
  console.log(`Seed ${seed}`);

  try {
    const result = await runMatch(s);
    human.finish(s);
    const w = result.winner != null ? s.players[result.winner] : undefined;
    console.log(w ? `Game over! Winner: ${w.name}` : 'Game over! Nobody won.');
  } catch (err) {
    if (!(err instanceof QuitRequested)) throw err;
    console.log('Bye.');
  } finally {
    rl.close();
  }
}

main().catch(e => {
  console.error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exit(1);
});
