/**
 * dagrad TF.js bridge
 *
 * @module dagrad/tf
 */

export {
  dispose,
  getBackend,
  initTensorFlow,
  isInitialized,
  tf,
  tidy,
} from "./backend.ts";

export { referenceGradients, replayGraph } from "./replay.ts";
