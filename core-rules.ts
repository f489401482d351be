// Core game rules encoded as typed constants
// These cover rules not carried by the card IR schema.

// Round structure and resolution ordering
export type ClashRules = {
  clashesPerRound: number;
  slowestPriority: number; // sort value of the 'A' priority; must exceed every numeric priority
};

// Player start values and match setup
export type PlayerRules = {
  startingHealth: number;
  startingTrunks: number;
  startingHand: number;
  draftsAtSetup: number; // sets drafted into discard before the starting hand is picked
};

// Max-health re-derivation applied on trunk loss
export type TrunkRules = {
  lowMaxAtOrBelow: number;
  lowMaxResetTo: number;
  highMaxAtOrAbove: number;
  highMaxResetTo: number;
};

export type HandRules = {
  baseHandSize: number;
  bonusPerLostTrunk: number;
};

export type DecisionRules = {
  retries: number; // re-asks after an out-of-range answer before defaulting
};

export type GameRules = {
  clashes: ClashRules;
  players: PlayerRules;
  trunks: TrunkRules;
  hand: HandRules;
  decisions: DecisionRules;
};

// Export a single, typed ruleset instance. Adjust here to tweak the game.
export const CORE_RULES: GameRules = {
  clashes: {
    clashesPerRound: 4,
    slowestPriority: 99,
  },
  players: {
    startingHealth: 5,
    startingTrunks: 3,
    startingHand: 4,
    draftsAtSetup: 2,
  },
  trunks: {
    lowMaxAtOrBelow: 3,
    lowMaxResetTo: 4,
    highMaxAtOrAbove: 7,
    highMaxResetTo: 6,
  },
  hand: {
    baseHandSize: 4,
    bonusPerLostTrunk: 1,
  },
  decisions: {
    retries: 1,
  },
};

export function maxHandSize(r: GameRules, trunks: number): number {
  const lost = Math.max(0, r.players.startingTrunks - trunks);
  return r.hand.baseHandSize + lost * r.hand.bonusPerLostTrunk;
}
