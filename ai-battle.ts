#!/usr/bin/env tsx
// Headless matches between heuristic and model-driven seats

import fs from 'node:fs';
import path from 'node:path';

import { type SeatConfig, createMatch, runMatch, snapshotPublic } from './engine.ts';
import { HeuristicSeat } from './decisions.ts';
import { LlmSeat, defaultModel } from './llm-seat.ts';

const KEY_NAMES = ['ANTHROPIC_API_KEY', 'GOOGLE_GENERATIVE_AI_API_KEY', 'OPENAI_API_KEY'];

function loadEnvLocal() {
  if (KEY_NAMES.some(k => process.env[k])) return;
  const envPath = path.join(process.cwd(), '.env.local');
  if (!fs.existsSync(envPath)) return;
  const txt = fs.readFileSync(envPath, 'utf8');
  for (const line of txt.split(/\r?\n/)) {
    const m = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/i);
    if (!m) continue;
    const key = m[1];
    let val = m[2];
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (!process.env[key]) process.env[key] = val;
  }
}

// ------------------------- CLI arg parsing -------------------------
type Args = {
  players: number;
  seed: number;
  games: number;
  rounds: number;
  llm: number[]; // seats driven by a model
  model?: string;
  out?: string;
  quiet: boolean;
};

function parseArgs(argv: string[]): Args {
  const args: Args = { players: 2, seed: 1, games: 1, rounds: 50, llm: [], quiet: false };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const nextReq = () => {
      const v = argv[++i];
      if (v == null) throw new Error(`Missing value for ${a}`);
      return v;
    };
    switch (a) {
      case '--players': args.players = Math.max(2, Number(nextReq())); break;
      case '--seed': args.seed = Number(nextReq()); break;
      case '--games': args.games = Math.max(1, Number(nextReq())); break;
      case '--rounds': args.rounds = Math.max(1, Number(nextReq())); break;
      case '--llm': args.llm = nextReq().split(',').map(s => Number(s.trim())).filter(n => Number.isInteger(n)); break;
      case '--model': args.model = nextReq(); break;
      case '--out': args.out = nextReq(); break;
      case '--quiet': args.quiet = true; break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        console.warn(`Ignoring unknown flag ${a}`);
        break;
    }
  }
  return args;
}

function printHelp() {
  console.log(`Run headless spell-clash matches

Usage: npm run battle -- [options]

Options:
  --players <n>       number of seats (default 2)
  --seed <n>          seed of the first game; later games add 1 (default 1)
  --games <n>         number of games to play (default 1)
  --rounds <n>        round limit per game (default 50)
  --llm <i,j,...>     seats played by a language model, e.g. 0 or 0,2
  --model <id>        model id for the selected provider
  --out <file.json>   write results and logs to a JSON file
  --quiet             print only the summary line of each game
  -h, --help          show this help
`);
}

function seatsFor(args: Args): SeatConfig[] {
  return Array.from({ length: args.players }, (_, i) => {
    if (!args.llm.includes(i)) return { name: `Bot ${i + 1}`, seat: new HeuristicSeat() };
    return { name: `Model ${i + 1}`, seat: new LlmSeat({ model: defaultModel(args.model) }) };
  });
}

async function runAIBattle() {
  loadEnvLocal();
  const args = parseArgs(process.argv);
  const wins = new Map<string, number>();
  const records: unknown[] = [];

  for (let g = 0; g < args.games; g++) {
    const seed = args.seed + g;
    const s = createMatch(seatsFor(args), { seed });
    const result = await runMatch(s, { maxRounds: args.rounds });
    const winner = result.winner != null ? s.players[result.winner]?.name ?? '?' : 'nobody';
    wins.set(winner, (wins.get(winner) ?? 0) + 1);

    if (!args.quiet) {
      console.log(`\n=== Game ${g + 1} (seed ${seed}) ===`);
      for (const line of s.log) console.log(line);
      for (const p of snapshotPublic(s).players) {
        console.log(`${p.name}: ${p.health}/${p.maxHealth} health, ${p.trunks} trunk(s), hand ${p.hand}, discard ${p.discard}`);
      }
    }
    console.log(`Game ${g + 1}: ${result.finished ? `winner ${winner}` : 'round limit reached'} after ${result.rounds} round(s).`);

    for (const p of s.players) {
      if (p.seat instanceof LlmSeat && p.seat.notes.length) {
        console.log(`${p.name} notes:\n  ${p.seat.notes.join('\n  ')}`);
      }
    }
    records.push({ seed, result, winner, log: s.log, events: s.events });
  }

  console.log(`\n=== Summary over ${args.games} game(s) ===`);
  for (const [name, n] of [...wins.entries()].sort((a, b) => b[1] - a[1])) console.log(`${name}: ${n}`);

  if (args.out) {
    const outPath = path.resolve(args.out);
    fs.writeFileSync(outPath, JSON.stringify(records, null, 2));
    console.log(`Wrote ${records.length} game(s) to ${outPath}`);
  }
}

runAIBattle().catch(e => {
  console.error('Battle error:', e instanceof Error ? e.stack ?? e.message : String(e));
  process.exit(1);
});
