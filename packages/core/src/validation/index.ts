export {
  assertObserverOptions,
  validateMaxHistoryLength,
  validateObserverOptions,
  type InputValidationResult,
  type UncheckedObserverOptions,
  type ValidationIssue,
} from './observer-options.js';
