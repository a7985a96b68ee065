/**
 * Shared behaviour for node group scalers.
 *
 * Concrete scalers only know how to set the desired size and how to count
 * running instances; waiting for the two to agree lives here.
 */

import type { Logger } from 'pino';
import type { NodeGroupScaler, SupportedProvider } from '@shared/types';
import { eventually } from '@shared/utils/eventually';

/**
 * Interval between group size checks while waiting for a resize.
 */
export const GROUP_SIZE_POLL_INTERVAL_MS = 20_000;

export abstract class BaseNodeGroupScaler implements NodeGroupScaler {
  abstract readonly provider: SupportedProvider;

  protected constructor(
    readonly groupName: string,
    protected readonly logger: Logger
  ) {}

  abstract resize(size: number): Promise<void>;

  abstract getSize(): Promise<number>;

  /**
   * Block until the group reports exactly `size` running instances.
   *
   * @throws ConvergenceTimeoutError if the group does not converge in time
   */
  async waitForSize(size: number, timeoutMs: number): Promise<void> {
    this.logger.info({ group: this.groupName, size, timeoutMs }, 'Waiting for node group size');

    await eventually(
      async () => {
        const current = await this.getSize();
        if (current !== size) {
          throw new Error(`Group ${this.groupName} has ${current} running instances, want ${size}`);
        }
      },
      {
        timeoutMs,
        intervalMs: GROUP_SIZE_POLL_INTERVAL_MS,
        description: `node group ${this.groupName} to reach size ${size}`,
        logger: this.logger,
      }
    );

    this.logger.info({ group: this.groupName, size }, 'Node group reached target size');
  }
}
