export {
  DEFAULT_TENSION_SETTINGS,
  calculateTension,
  calculateUrgency,
  unresolvedRatio,
  blockingFactor,
  unitTension,
  propagateTensionUp,
  inheritImportance,
  type TensionFactors,
} from './calculus.js';
export { updateAllTensions, type TensionTree } from './tree.js';
export { TensionManager } from './manager.js';
