export {
  collectDeadLinks,
  toLastStatus,
  validateEndpoints,
  validateUrl,
  type UrlValidation,
  type ValidationResult,
  type ValidatorDeps,
  type ValidatorOptions,
} from './endpoint-validator';
