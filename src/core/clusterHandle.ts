/**
 * Builds the cluster handle the scenario and restore step work through.
 */

import { setTimeout } from 'timers/promises';
import type { ClusterHandle, SuiteConfig, SupportedProvider } from '@shared/types';
import { createKubeClients, loadKubeConfig } from '@kube/client';
import { KubeLeaseRegistry } from '@kube/leaseRegistry';
import { KubeClusterInspector } from '@kube/clusterInspector';
import { getScaler } from '@scalers/factory';

export const defaultDelay = (ms: number): Promise<void> => setTimeout(ms);

/**
 * Connect to the configured cluster and node group.
 */
export function createClusterHandle(config: SuiteConfig, provider: SupportedProvider): ClusterHandle {
  const kube = createKubeClients(loadKubeConfig(config));

  return {
    config,
    scaler: getScaler(provider, config),
    leases: new KubeLeaseRegistry(kube.coordination, config.namespaces.lease),
    inspector: new KubeClusterInspector(kube.core),
    delay: defaultDelay,
  };
}
