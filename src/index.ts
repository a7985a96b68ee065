/**
 * Entry point for the node lease lifecycle suite.
 *
 * Loads configuration, evaluates the capability guard, and runs the
 * scenario inside the restore guarantee.
 */

import type { ClusterHandle, ScenarioReport, SuiteConfig, SupportedProvider } from '@shared/types';
import { ConfigError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { loadConfig } from '@core/config';
import { evaluateGuard } from '@core/guard';
import { buildReport } from '@core/report';
import { NodeLeaseScenario } from '@core/scenario';
import { withClusterHandle } from '@core/restore';
import { createClusterHandle } from '@core/clusterHandle';

const logger = setupLogger('node-lease:main');

/**
 * Default config file, overridable with NODE_LEASE_CONFIG
 * (a path, or `ssm:<parameter name>`).
 */
export const DEFAULT_CONFIG_SOURCE = './node-lease.yaml';

export type HandleFactory = (config: SuiteConfig, provider: SupportedProvider) => ClusterHandle;

/**
 * Run the suite against an already loaded configuration.
 *
 * @returns `skipped` when the cluster cannot host the scenario, otherwise
 *   the scenario report
 * @throws {ConfigError} for configurations the suite refuses to run
 * @throws {RestoreError} when the cluster could not be restored
 */
export async function runNodeLeaseSuite(
  config: SuiteConfig,
  createHandle: HandleFactory = createClusterHandle
): Promise<ScenarioReport> {
  const startedAt = Date.now();
  const guard = evaluateGuard(config);

  switch (guard.decision) {
    case 'fail-config':
      logger.error({ reason: guard.reason }, 'Invalid suite configuration');
      throw new ConfigError(guard.reason);
    case 'skip':
      logger.warn({ reason: guard.reason }, 'Skipping node lease suite');
      return buildReport('skipped', 'init', guard.reason, startedAt);
    case 'run':
      break;
  }

  logger.info(
    { provider: guard.provider, numNodes: config.numNodes, group: config.nodeInstanceGroup },
    'Starting node lease suite'
  );

  const handle = createHandle(config, guard.provider);
  const scenario = new NodeLeaseScenario(handle);
  const report = await withClusterHandle(handle, (baseline) => scenario.run(baseline));

  logger.info(
    { outcome: report.outcome, phase: report.phase, removedNode: report.removedNode, durationMs: report.durationMs },
    'Node lease suite completed'
  );
  return report;
}

/**
 * Load configuration from NODE_LEASE_CONFIG (or the default file) and run.
 */
export async function main(source: string = process.env.NODE_LEASE_CONFIG ?? DEFAULT_CONFIG_SOURCE): Promise<ScenarioReport> {
  const config = await loadConfig(source);
  return runNodeLeaseSuite(config);
}
