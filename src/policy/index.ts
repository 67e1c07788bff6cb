export {
  DEFAULT_TRAILING_RULES,
  classifyStop,
  evaluateExit,
  initialStop,
  targetFor,
  trailingStopUpdate,
  type ExitDecision,
  type TrailingRules,
  type TrailingStopResult
} from './stopPolicy.js';
