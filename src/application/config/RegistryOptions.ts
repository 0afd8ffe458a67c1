/**
 * subject-registry - Registry Options
 *
 * Configuration for subject registries. Explicit options win over
 * environment variables, which win over defaults.
 */

import type { IAsyncSubscriber } from '../../domain/subscriber';
import { ConfigurationException, SubscriberFailure } from '../../domain/exceptions';
import { ILogger, consoleLogger, silentLogger } from '../../infrastructure/logging';

/**
 * What a broadcast does when a subscriber fails.
 *
 * - `propagate`: stop at the first failure and rethrow it
 * - `isolate`: visit every subscriber, then throw one aggregate error
 */
export type FailurePolicy = 'propagate' | 'isolate';

export const FAILURE_POLICIES: readonly FailurePolicy[] = ['propagate', 'isolate'];

/** Environment variable overriding the failure policy */
export const FAILURE_POLICY_ENV = 'SUBJECT_REGISTRY_FAILURE_POLICY';

/** Environment variable overriding the registry name */
export const REGISTRY_NAME_ENV = 'SUBJECT_REGISTRY_NAME';

/**
 * Registry configuration options
 *
 * @template TSubscriber - Subscriber type reported to `onError`
 */
export interface SubjectRegistryOptions<
  TSubscriber extends IAsyncSubscriber = IAsyncSubscriber,
> {
  /** Name used in log lines and error messages; blank counts as unset */
  name?: string;

  /** Failure handling during broadcast */
  failurePolicy?: FailurePolicy;

  /** Custom logger */
  logger?: ILogger;

  /** Called once per failed delivery, under either policy */
  onError?(failure: SubscriberFailure<TSubscriber>): void;
}

/**
 * Options after defaults and environment have been applied
 */
export interface ResolvedRegistryOptions<
  TSubscriber extends IAsyncSubscriber = IAsyncSubscriber,
> {
  name: string;
  failurePolicy: FailurePolicy;
  logger: ILogger;
  onError?(failure: SubscriberFailure<TSubscriber>): void;
}

export const DEFAULT_REGISTRY_OPTIONS = {
  name: 'subject-registry',
  failurePolicy: 'propagate',
} as const satisfies Pick<ResolvedRegistryOptions, 'name' | 'failurePolicy'>;

/**
 * Environment shape read by {@link resolveRegistryOptions}
 */
export type RegistryEnvironment = Record<string, string | undefined>;

export function isFailurePolicy(value: unknown): value is FailurePolicy {
  return FAILURE_POLICIES.some((policy) => policy === value);
}

function policyFromEnv(env: RegistryEnvironment): FailurePolicy | undefined {
  const raw = env[FAILURE_POLICY_ENV]?.trim();
  if (!raw) {
    return undefined;
  }

  const normalized = raw.toLowerCase();
  if (!isFailurePolicy(normalized)) {
    throw new ConfigurationException(FAILURE_POLICY_ENV, raw, FAILURE_POLICIES);
  }
  return normalized;
}

/**
 * Apply environment overrides and defaults to registry options.
 *
 * @throws ConfigurationException if `SUBJECT_REGISTRY_FAILURE_POLICY` holds an unknown policy
 *
 * @example
 * ```typescript
 * // SUBJECT_REGISTRY_FAILURE_POLICY=isolate
 * resolveRegistryOptions({ name: 'orders' });
 * // { name: 'orders', failurePolicy: 'isolate', logger: consoleLogger }
 * ```
 */
export function resolveRegistryOptions<
  TSubscriber extends IAsyncSubscriber = IAsyncSubscriber,
>(
  options: SubjectRegistryOptions<TSubscriber> = {},
  env: RegistryEnvironment = process.env,
): ResolvedRegistryOptions<TSubscriber> {
  const envPolicy = policyFromEnv(env);
  const envName = env[REGISTRY_NAME_ENV]?.trim();

  return {
    name: options.name?.trim() || envName || DEFAULT_REGISTRY_OPTIONS.name,
    failurePolicy:
      options.failurePolicy ?? envPolicy ?? DEFAULT_REGISTRY_OPTIONS.failurePolicy,
    logger:
      options.logger ?? (env.NODE_ENV === 'test' ? silentLogger : consoleLogger),
    onError: options.onError,
  };
}
