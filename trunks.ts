// Trunk / elimination manager

import type { GameRules } from './core-rules.ts';
import {
  type GameState,
  type PlayerIndex,
  RoundOver,
  clearBoard,
  emit,
  isContender,
  isVulnerable,
  player,
  pushLog,
} from './state.ts';

export function rederiveMaxHealth(r: GameRules, max: number): number {
  if (max <= r.trunks.lowMaxAtOrBelow) return r.trunks.lowMaxResetTo;
  if (max >= r.trunks.highMaxAtOrAbove) return r.trunks.highMaxResetTo;
  return max;
}

export function loseTrunk(s: GameState, pid: PlayerIndex) {
  const p = player(s, pid);
  if (p.trunks === 0) return;
  p.trunks -= 1;
  p.invulnerable = true;
  const cleared = clearBoard(p);
  p.maxHealth = rederiveMaxHealth(s.rules, p.maxHealth);
  p.health = p.maxHealth;
  pushLog(s, `${p.name} loses a trunk! ${p.trunks} left, health reset to ${p.health}/${p.maxHealth}.`);
  if (cleared) pushLog(s, `${p.name}'s ${cleared} spell(s) were cleared from the board.`);
  emit(s, 'TrunkLost', pid, { value: p.trunks });

  if (p.trunks === 0) {
    pushLog(s, `${p.name} has lost every trunk and is out of the match.`);
    emit(s, 'PlayerEliminated', pid);
  }

}

// Eliminations from one resolution step settle together, so a mutual knockout is a draw
export function settleMatch(s: GameState) {
  if (s.gameOver) return;
  const contenders = s.players.filter(isContender);
  if (contenders.length >= 2) return;
  s.gameOver = true;
  s.winner = contenders[0]?.idx;
  pushLog(s, s.winner != null ? `${player(s, s.winner).name} wins the match!` : 'No player retains a trunk; the match ends without a winner.');
}

// Players left at 0 health by something other than damage (weaken) still lose a trunk
export function settleKnockouts(s: GameState) {
  for (const p of s.players) {
    if (isVulnerable(p) && p.health === 0) loseTrunk(s, p.idx);
  }
}

export function checkTermination(s: GameState) {
  settleKnockouts(s);
  settleMatch(s);
  if (s.gameOver) throw new RoundOver(true);
  if (s.players.filter(isVulnerable).length < 2) throw new RoundOver(false);
}
