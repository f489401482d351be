// Aggregator module: re-exports the card IR, catalog, analysis and engine APIs
export * from './schema.ts';
export { CORE_RULES, maxHandSize, type GameRules } from './core-rules.ts';
export { analyzeRules, type RuleAnalysis, type RuleIssue } from './rules-verifier.ts';
export { analyzeCard, analyzeGlobal, walkCondition, walkEffect, type AnalysisIssue, type AnalysisResult } from './analysis.ts';
export { buildCatalog, cardById, extendCatalog, getCatalog, loadCatalogFile, type Catalog, type CatalogIssue } from './catalog.ts';
export { cardToText, conditionToText, effectToText } from './ability-text-generator.ts';
export { HeuristicSeat, type Awaitable, type DecisionSource } from './decisions.ts';
export { LlmSeat, defaultModel, type LlmSeatOptions } from './llm-seat.ts';
export {
  createMatch,
  runClash,
  runMatch,
  runRound,
  setupMatch,
  snapshotPublic,
  type MatchOptions,
  type MatchResult,
  type SeatConfig,
} from './engine.ts';
export {
  InvariantViolation,
  RoundOver,
  type GameEvent,
  type GameState,
  type PlayedInstance,
  type PlayerState,
  type TargetRef,
} from './state.ts';
