/**
 * Baseline capture and the restore guarantee.
 *
 * The cluster is shared by every suite that runs after this one, so once
 * the baseline has been captured the node group is always grown back and
 * the cluster waited back to health, whatever the scenario outcome.
 */

import type { ClusterBaseline, ClusterHandle, ScenarioReport } from '@shared/types';
import { RestoreError, errorMessage } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { buildReport } from './report';

const logger = setupLogger('node-lease:restore');

/**
 * Record what the restore step must return the cluster to.
 */
export async function captureBaseline(handle: ClusterHandle): Promise<ClusterBaseline> {
  const { config, inspector } = handle;
  const systemPods = await inspector.countRunningReadyPods(config.namespaces.system);

  logger.info(
    { numNodes: config.numNodes, systemPods, namespace: config.namespaces.system },
    'Captured cluster baseline'
  );
  return { numNodes: config.numNodes, systemPods };
}

/**
 * Grow the node group back to its original size and wait for the cluster
 * to be healthy again. Each step depends on the previous one.
 *
 * @throws {RestoreError} on the first step that fails
 */
export async function restoreCluster(
  handle: ClusterHandle,
  baseline: ClusterBaseline,
  report?: ScenarioReport
): Promise<void> {
  const { scaler, inspector, config, delay } = handle;
  const { timeouts } = config;
  let step = 'resize node group';

  try {
    logger.info({ size: baseline.numNodes }, 'Restoring the original node instance group size');
    await scaler.resize(baseline.numNodes);

    // GKE tunnels to a deleted node can linger and be reused; there is nothing to poll for.
    if (scaler.provider === 'gke' && timeouts.tunnelGrace > 0) {
      step = 'wait for dead tunnels to be dropped';
      logger.info({ delayMs: timeouts.tunnelGrace }, 'Waiting for all dead tunnels to be dropped');
      await delay(timeouts.tunnelGrace);
    }

    step = 'wait for node group size';
    await scaler.waitForSize(baseline.numNodes, timeouts.groupResize);

    step = 'wait for ready nodes';
    await inspector.waitForReadyNodes(baseline.numNodes, timeouts.nodeReady);

    step = 'wait for system pods';
    logger.info('Waiting for system pods to successfully restart');
    await inspector.waitForPodsRunningReady(
      config.namespaces.system,
      baseline.systemPods,
      0,
      timeouts.podReady
    );
  } catch (error) {
    logger.error({ step, error: errorMessage(error) }, 'Failed to restore the cluster');
    throw new RestoreError(
      `Couldn't restore the original cluster size (${step}): ${errorMessage(error)}`,
      report,
      { cause: error }
    );
  }

  logger.info({ numNodes: baseline.numNodes, systemPods: baseline.systemPods }, 'Cluster restored');
}

/**
 * Scoped use of the cluster: capture the baseline, run `body`, restore.
 *
 * When setup itself fails nothing was disturbed, so the restore step is
 * skipped and a failed report is returned. Otherwise restore runs on every
 * exit path of `body` and a restore failure is thrown.
 */
export async function withClusterHandle(
  handle: ClusterHandle,
  body: (baseline: ClusterBaseline) => Promise<ScenarioReport>
): Promise<ScenarioReport> {
  const startedAt = Date.now();
  let setupComplete = false;
  let baseline: ClusterBaseline = { numNodes: handle.config.numNodes, systemPods: 0 };
  let report: ScenarioReport | undefined;

  try {
    baseline = await captureBaseline(handle);
    setupComplete = true;
    report = await body(baseline);
    return report;
  } catch (error) {
    if (setupComplete) {
      throw error;
    }
    logger.error({ error: errorMessage(error) }, 'Setup failed, cluster left untouched');
    return buildReport('failed', 'init', `Setup failed: ${errorMessage(error)}`, startedAt);
  } finally {
    if (setupComplete) {
      await restoreCluster(handle, baseline, report);
    }
  }
}
