/**
 * Capability check evaluated before the scenario starts.
 */

import type { GuardDecision, SuiteConfig, SupportedProvider } from '@shared/types';
import { SUPPORTED_PROVIDERS } from '@shared/types';

/**
 * Smallest cluster on which removing one node still leaves a node behind.
 */
export const MIN_NODE_COUNT = 2;

export function isSupportedProvider(provider: string): provider is SupportedProvider {
  return (SUPPORTED_PROVIDERS as readonly string[]).includes(provider);
}

/**
 * Decide whether the scenario can run against the configured cluster.
 *
 * Several comma-separated node groups are a configuration error. An
 * unsupported provider or a cluster that is too small is a skip, which
 * is neither a pass nor a failure and also skips the restore step.
 */
export function evaluateGuard(config: SuiteConfig): GuardDecision {
  if (config.nodeInstanceGroup.includes(',')) {
    return {
      decision: 'fail-config',
      reason: `Suite does not support cluster setup with more than one node group: ${config.nodeInstanceGroup}`,
    };
  }

  if (!isSupportedProvider(config.provider)) {
    return {
      decision: 'skip',
      reason: `Only supported for providers [${SUPPORTED_PROVIDERS.join(' ')}] (not ${config.provider})`,
    };
  }

  if (config.numNodes < MIN_NODE_COUNT) {
    return {
      decision: 'skip',
      reason: `Requires at least ${MIN_NODE_COUNT} nodes (not ${config.numNodes})`,
    };
  }

  return { decision: 'run', provider: config.provider };
}
