/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable test data for unit tests.
 */

import type { V1Lease, V1Node, V1Pod, V1PodStatus, V1Taint } from '@kubernetes/client-node';
import type { SuiteConfig } from '@shared/types';

/**
 * Creates a mock suite configuration (timeouts in milliseconds).
 *
 * @param overrides - Optional overrides for specific config properties
 */
export function createMockConfig(overrides: Partial<SuiteConfig> = {}): SuiteConfig {
  const defaultConfig: SuiteConfig = {
    provider: 'aws',
    numNodes: 4,
    nodeInstanceGroup: 'test-node-group',
    region: 'us-east-1',
    namespaces: {
      lease: 'kube-node-lease',
      system: 'kube-system',
    },
    timeouts: {
      leasePoll: 60_000,
      leasePollInterval: 5_000,
      nodeReady: 600_000,
      groupResize: 1_200_000,
      podReady: 300_000,
      tunnelGrace: 300_000,
    },
  };

  return { ...defaultConfig, ...overrides };
}

export interface NodeOptions {
  ready?: boolean;
  unschedulable?: boolean;
  networkUnavailable?: boolean | 'Unknown';
  taintEffect?: V1Taint['effect'];
}

/**
 * Creates a Kubernetes Node object.
 */
export function createNode(name: string, options: NodeOptions = {}): V1Node {
  const { ready = true, unschedulable = false, networkUnavailable = false, taintEffect } = options;

  return {
    metadata: { name },
    spec: {
      unschedulable,
      taints: taintEffect ? [{ key: 'test-taint', effect: taintEffect }] : undefined,
    },
    status: {
      conditions: [
        { type: 'Ready', status: ready ? 'True' : 'False' },
        {
          type: 'NetworkUnavailable',
          status: networkUnavailable === 'Unknown' ? 'Unknown' : networkUnavailable ? 'True' : 'False',
        },
      ],
    },
  };
}

/**
 * Creates a Kubernetes Pod object.
 */
export function createPod(
  name: string,
  phase: NonNullable<V1PodStatus['phase']>,
  ready: boolean = phase === 'Running'
): V1Pod {
  return {
    metadata: { name, namespace: 'kube-system' },
    status: {
      phase,
      conditions: [{ type: 'Ready', status: ready ? 'True' : 'False' }],
    },
  };
}

/**
 * Creates a node Lease object.
 */
export function createLease(nodeName: string): V1Lease {
  return {
    metadata: { name: nodeName, namespace: 'kube-node-lease' },
    spec: {
      holderIdentity: nodeName,
      renewTime: new Date('2026-01-01T00:00:00.000Z'),
    },
  };
}
