/**
 * Node lease lookups.
 */

import type { V1Lease } from '@kubernetes/client-node';
import type { Lease, LeaseRegistry } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { isNotFound } from './errors';

const logger = setupLogger('node-lease:leases');

/**
 * The part of CoordinationV1Api this registry calls.
 */
export interface LeaseReader {
  readNamespacedLease(param: { name: string; namespace: string }): Promise<V1Lease>;
}

/**
 * Reads node leases from a single namespace (normally kube-node-lease).
 */
export class KubeLeaseRegistry implements LeaseRegistry {
  constructor(
    private readonly api: LeaseReader,
    private readonly namespace: string
  ) {}

  /**
   * @returns the lease for `nodeName`, or undefined when the API server has none
   * @throws any error other than Not Found
   */
  async get(nodeName: string): Promise<Lease | undefined> {
    try {
      const lease = await this.api.readNamespacedLease({ name: nodeName, namespace: this.namespace });
      const renewTime = lease.spec?.renewTime;

      return {
        nodeName: lease.metadata?.name ?? nodeName,
        holderIdentity: lease.spec?.holderIdentity,
        renewTime: renewTime ? new Date(renewTime) : undefined,
      };
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug({ nodeName, namespace: this.namespace }, 'Lease not found');
        return undefined;
      }
      throw error;
    }
  }
}
