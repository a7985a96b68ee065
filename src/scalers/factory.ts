/**
 * Scaler factory.
 *
 * Picks the node group implementation for the configured provider.
 */

import type { NodeGroupScaler, SuiteConfig, SupportedProvider } from '@shared/types';
import { ConfigValidationError } from '@shared/errors';
import { AsgNodeGroupScaler } from './asgGroup';
import { ManagedInstanceGroupScaler } from './managedInstanceGroup';
import type { CommandRunner } from './managedInstanceGroup';

export interface ScalerDependencies {
  run?: CommandRunner;
}

/**
 * Build the scaler for a provider that already passed the capability guard.
 *
 * @throws {ConfigValidationError} If provider specific settings are missing
 */
export function getScaler(
  provider: SupportedProvider,
  config: SuiteConfig,
  deps: ScalerDependencies = {}
): NodeGroupScaler {
  switch (provider) {
    case 'aws':
      return new AsgNodeGroupScaler(config.nodeInstanceGroup, config.region);
    case 'gce':
    case 'gke': {
      const { project, zone } = config;
      if (!project || !zone) {
        throw new ConfigValidationError(
          `Provider ${provider} requires both project and zone (got project=${project ?? ''}, zone=${zone ?? ''})`
        );
      }
      return new ManagedInstanceGroupScaler({
        provider,
        groupName: config.nodeInstanceGroup,
        project,
        zone,
        run: deps.run,
      });
    }
  }
}
