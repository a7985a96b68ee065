/**
 * Node lease lifecycle scenario.
 *
 * Checks that every live node has a lease, shrinks the node group by one,
 * then checks that the removed node's lease is deleted while the leases
 * of the surviving nodes stay in place.
 */

import type {
  ClusterBaseline,
  ClusterHandle,
  NodeSet,
  ScenarioPhase,
  ScenarioReport,
} from '@shared/types';
import { ScenarioAssertionError, errorMessage } from '@shared/errors';
import { eventually } from '@shared/utils/eventually';
import type { EventuallyOptions } from '@shared/utils/eventually';
import { setupLogger } from '@shared/utils/logger';
import { buildReport } from './report';
import type { ReportDetails } from './report';

const logger = setupLogger('node-lease:scenario');

function nodeNames(nodes: NodeSet): string[] {
  return nodes.map((n) => n.name);
}

/**
 * Name of the single node present in `before` but not in `after`.
 *
 * @throws {ScenarioAssertionError} unless exactly one node disappeared
 */
export function identifyRemovedNode(before: NodeSet, after: NodeSet): string {
  const remaining = new Set(nodeNames(after));
  const removed = nodeNames(before).filter((name) => !remaining.has(name));

  if (removed.length !== 1) {
    throw new ScenarioAssertionError(
      'identify-removed',
      `Expected exactly one removed node, found ${removed.length}: [${removed.join(', ')}]`
    );
  }
  return removed[0];
}

export class NodeLeaseScenario {
  private phase: ScenarioPhase = 'init';

  constructor(private readonly handle: ClusterHandle) {}

  get currentPhase(): ScenarioPhase {
    return this.phase;
  }

  /**
   * Run the scenario against a cluster whose baseline has been captured.
   *
   * Never throws: assertion and convergence failures become a `failed`
   * report naming the phase they happened in.
   */
  async run(baseline: ClusterBaseline): Promise<ScenarioReport> {
    const startedAt = Date.now();
    const details: ReportDetails = {};
    const { scaler, inspector, config } = this.handle;
    const { timeouts } = config;

    try {
      this.enter('baseline-wait');
      await inspector.waitForReadyNodes(baseline.numNodes, timeouts.nodeReady);

      this.enter('baseline-lease-check');
      const originalNodes = await this.snapshot(baseline.numNodes);
      details.baselineNodes = nodeNames(originalNodes);
      await this.expectLeasesPresent(originalNodes, 'every node');

      this.enter('disrupt');
      const targetNumNodes = originalNodes.length - 1;
      logger.info({ targetNumNodes }, `Decreasing cluster size to ${targetNumNodes}`);
      await scaler.resize(targetNumNodes);
      await scaler.waitForSize(targetNumNodes, timeouts.groupResize);
      await inspector.waitForReadyNodes(targetNumNodes, timeouts.nodeReady);
      const targetNodes = await this.snapshot(targetNumNodes);
      details.remainingNodes = nodeNames(targetNodes);

      this.enter('identify-removed');
      const removedNode = identifyRemovedNode(originalNodes, targetNodes);
      details.removedNode = removedNode;
      logger.info({ removedNode }, 'Identified removed node');

      this.enter('deletion-check');
      await this.expectLeaseDeleted(removedNode);

      this.enter('survivor-check');
      await this.expectLeasesPresent(targetNodes, 'remaining nodes');

      this.enter('done');
      return buildReport(
        'passed',
        'done',
        `Lease of removed node ${removedNode} was deleted and ${targetNodes.length} remaining leases were kept`,
        startedAt,
        details
      );
    } catch (error) {
      const failedPhase = error instanceof ScenarioAssertionError ? error.phase : this.phase;
      const message = errorMessage(error);
      logger.error({ phase: failedPhase, error: message }, 'Scenario failed');
      this.phase = 'failed';
      return buildReport('failed', failedPhase, message, startedAt, details);
    }
  }

  private enter(phase: ScenarioPhase): void {
    logger.info({ from: this.phase, to: phase }, `Entering phase ${phase}`);
    this.phase = phase;
  }

  /**
   * Ready schedulable nodes, required to number exactly `expected`.
   */
  private async snapshot(expected: number): Promise<NodeSet> {
    const nodes = await this.handle.inspector.listReadySchedulableNodes();
    if (nodes.length !== expected) {
      throw new ScenarioAssertionError(
        this.phase,
        `Expected ${expected} ready schedulable nodes, found ${nodes.length}: [${nodeNames(nodes).join(', ')}]`
      );
    }
    return nodes;
  }

  private async expectLeasesPresent(nodes: NodeSet, label: string): Promise<void> {
    logger.info({ nodes: nodeNames(nodes) }, `Verifying node lease exists for ${label}`);

    await eventually(
      async () => {
        const missing: string[] = [];
        for (const node of nodes) {
          try {
            if (!(await this.handle.leases.get(node.name))) {
              missing.push(node.name);
            }
          } catch (error) {
            logger.info({ node: node.name, error: errorMessage(error) }, 'Failed to get node lease');
            missing.push(node.name);
          }
        }
        if (missing.length > 0) {
          throw new Error(`Node lease is missing for nodes: ${missing.join(', ')}`);
        }
      },
      this.leasePollOptions(`node leases of ${label}`)
    );
  }

  private async expectLeaseDeleted(nodeName: string): Promise<void> {
    logger.info({ node: nodeName }, 'Verifying node lease is deleted for the removed node');

    await eventually(async () => {
      if (await this.handle.leases.get(nodeName)) {
        throw new Error(`Node lease is not deleted yet for node "${nodeName}"`);
      }
    }, this.leasePollOptions(`deletion of node lease ${nodeName}`));
  }

  private leasePollOptions(description: string): EventuallyOptions {
    const { leasePoll, leasePollInterval } = this.handle.config.timeouts;
    return { timeoutMs: leasePoll, intervalMs: leasePollInterval, description, logger };
  }
}
