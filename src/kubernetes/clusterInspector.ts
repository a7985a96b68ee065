/**
 * Cluster observations: node membership and system pod health.
 */

import type { V1Node, V1NodeList, V1Pod, V1PodList } from '@kubernetes/client-node';
import type { ClusterInspector, ClusterNode, NodeSet } from '@shared/types';
import { eventually } from '@shared/utils/eventually';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('node-lease:inspector');

export const NODE_POLL_INTERVAL_MS = 20_000;
export const POD_POLL_INTERVAL_MS = 2_000;

const SCHEDULABLE_FIELD_SELECTOR = 'spec.unschedulable=false';
const BLOCKING_TAINT_EFFECTS: ReadonlySet<string> = new Set(['NoSchedule', 'NoExecute']);

/**
 * The part of CoreV1Api this inspector calls.
 */
export interface CoreReader {
  listNode(param: { fieldSelector?: string }): Promise<V1NodeList>;
  listNamespacedPod(param: { namespace: string }): Promise<V1PodList>;
}

function hasCondition(
  conditions: ReadonlyArray<{ type: string; status: string }> | undefined,
  type: string
): boolean {
  return (conditions ?? []).some((c) => c.type === type && c.status === 'True');
}

export function isNodeReady(node: V1Node): boolean {
  return hasCondition(node.status?.conditions, 'Ready');
}

/**
 * NetworkUnavailable is either unset or explicitly False.
 */
export function isNodeNetworkReady(node: V1Node): boolean {
  return !(node.status?.conditions ?? []).some((c) => c.type === 'NetworkUnavailable' && c.status !== 'False');
}

/**
 * Ready, not cordoned, networked and free of taints that repel ordinary pods.
 */
export function isNodeSchedulable(node: V1Node): boolean {
  if (node.spec?.unschedulable) {
    return false;
  }
  if (!isNodeReady(node) || !isNodeNetworkReady(node)) {
    return false;
  }
  return !(node.spec?.taints ?? []).some((t) => BLOCKING_TAINT_EFFECTS.has(t.effect));
}

export function isPodRunningReady(pod: V1Pod): boolean {
  return pod.status?.phase === 'Running' && hasCondition(pod.status.conditions, 'Ready');
}

function toClusterNode(node: V1Node): ClusterNode {
  return {
    name: node.metadata?.name ?? '',
    ready: isNodeReady(node),
    schedulable: isNodeSchedulable(node),
  };
}

export class KubeClusterInspector implements ClusterInspector {
  constructor(private readonly api: CoreReader) {}

  async listReadySchedulableNodes(): Promise<NodeSet> {
    const list = await this.api.listNode({ fieldSelector: SCHEDULABLE_FIELD_SELECTOR });
    const nodes = list.items.filter(isNodeSchedulable).map(toClusterNode);
    return Object.freeze(nodes);
  }

  /**
   * Wait until the cluster lists exactly `count` schedulable nodes, all Ready
   * with their network up.
   */
  async waitForReadyNodes(count: number, timeoutMs: number): Promise<void> {
    logger.info({ count, timeoutMs }, 'Waiting for ready nodes');

    await eventually(
      async () => {
        const list = await this.api.listNode({ fieldSelector: SCHEDULABLE_FIELD_SELECTOR });
        const total = list.items.length;
        const ready = list.items.filter((n) => isNodeReady(n) && isNodeNetworkReady(n)).length;
        if (total !== count || ready !== count) {
          throw new Error(`Cluster has ${total} nodes, ${ready} ready, want ${count}`);
        }
      },
      {
        timeoutMs,
        intervalMs: NODE_POLL_INTERVAL_MS,
        description: `${count} ready nodes`,
        logger,
      }
    );
  }

  async countRunningReadyPods(namespace: string): Promise<number> {
    const list = await this.api.listNamespacedPod({ namespace });
    return list.items.filter(isPodRunningReady).length;
  }

  /**
   * Wait until at least `minPods` pods in `namespace` are running and ready,
   * with no more than `allowedNotReady` others. Succeeded pods are ignored.
   */
  async waitForPodsRunningReady(
    namespace: string,
    minPods: number,
    allowedNotReady: number,
    timeoutMs: number
  ): Promise<void> {
    logger.info({ namespace, minPods, allowedNotReady, timeoutMs }, 'Waiting for pods to be running and ready');

    await eventually(
      async () => {
        const list = await this.api.listNamespacedPod({ namespace });
        const pods = list.items.filter((p) => p.status?.phase !== 'Succeeded');
        const notReady = pods.filter((p) => !isPodRunningReady(p));
        const ready = pods.length - notReady.length;

        if (ready < minPods || notReady.length > allowedNotReady) {
          const names = notReady.map((p) => p.metadata?.name ?? '?').join(', ');
          throw new Error(
            `${ready} / ${minPods} pods in ${namespace} running and ready, ${notReady.length} not ready: [${names}]`
          );
        }
      },
      {
        timeoutMs,
        intervalMs: POD_POLL_INTERVAL_MS,
        description: `${minPods} running and ready pods in ${namespace}`,
        logger,
      }
    );
  }
}
