export {
  EvolutionEngine,
  evolveBlueprint,
  missingBlueprint,
  nameFromIntent,
  type EvolutionDeps,
} from './engine.js';
export { composeMembers } from './composer.js';
export { evaluateResult } from './evaluator.js';
export { scoreMember, pickBest, baseName, versionOf, keywordMatches } from './selector.js';
export { SELECTION_KEYWORDS } from './keywords.js';
export type {
  EvolutionConfig,
  Selections,
  PoolMember,
  Composition,
  EvolvedMember,
  EvolutionTask,
  StepResult,
  RoundResult,
  LoopResult,
  StepEvent,
  EvolvedEvent,
  PrunedEvent,
} from './types.js';
