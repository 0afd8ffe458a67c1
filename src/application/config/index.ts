/**
 * @module subject-registry/application/config
 * @description Registry configuration
 */

export type {
  FailurePolicy,
  SubjectRegistryOptions,
  ResolvedRegistryOptions,
  RegistryEnvironment,
} from './RegistryOptions';

export {
  FAILURE_POLICIES,
  FAILURE_POLICY_ENV,
  REGISTRY_NAME_ENV,
  DEFAULT_REGISTRY_OPTIONS,
  isFailurePolicy,
  resolveRegistryOptions,
} from './RegistryOptions';
