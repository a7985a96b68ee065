/**
 * Kubernetes API client construction.
 */

import { CoordinationV1Api, CoreV1Api, KubeConfig } from '@kubernetes/client-node';
import type { SuiteConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('node-lease:kube');

export interface KubeClients {
  core: CoreV1Api;
  coordination: CoordinationV1Api;
}

/**
 * Load credentials from the configured kubeconfig, or from the default
 * chain (KUBECONFIG, ~/.kube/config, in-cluster service account).
 */
export function loadKubeConfig(config: Pick<SuiteConfig, 'kubeconfig' | 'context'>): KubeConfig {
  const kc = new KubeConfig();

  if (config.kubeconfig) {
    kc.loadFromFile(config.kubeconfig);
  } else {
    kc.loadFromDefault();
  }

  if (config.context) {
    kc.setCurrentContext(config.context);
  }

  logger.info({ context: kc.getCurrentContext() }, 'Loaded kubeconfig');
  return kc;
}

export function createKubeClients(kc: KubeConfig): KubeClients {
  return {
    core: kc.makeApiClient(CoreV1Api),
    coordination: kc.makeApiClient(CoordinationV1Api),
  };
}
