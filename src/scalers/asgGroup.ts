/**
 * Node group scaler backed by an AWS EC2 Auto Scaling Group.
 */

import {
  AutoScalingClient,
  DescribeAutoScalingGroupsCommand,
  SetDesiredCapacityCommand,
} from '@aws-sdk/client-auto-scaling';
import { setupLogger } from '@shared/utils/logger';
import { BaseNodeGroupScaler } from './base';

/**
 * Resizes the cluster's worker ASG through its DesiredCapacity.
 *
 * Only instances in the `InService` lifecycle state are counted as part of
 * the group, so instances still launching or terminating keep a wait open.
 */
export class AsgNodeGroupScaler extends BaseNodeGroupScaler {
  readonly provider = 'aws' as const;
  private autoScalingClient: AutoScalingClient;

  constructor(asgName: string, region?: string, client?: AutoScalingClient) {
    super(asgName, setupLogger('node-lease:scaler.asg'));
    this.autoScalingClient = client ?? new AutoScalingClient({ region });
  }

  async resize(size: number): Promise<void> {
    this.logger.info({ asgName: this.groupName, desiredCapacity: size }, 'Setting ASG desired capacity');

    try {
      await this.autoScalingClient.send(
        new SetDesiredCapacityCommand({
          AutoScalingGroupName: this.groupName,
          DesiredCapacity: size,
          HonorCooldown: false,
        })
      );
    } catch (error) {
      this.logger.error({ asgName: this.groupName, error }, 'Failed to set ASG desired capacity');
      throw error;
    }
  }

  async getSize(): Promise<number> {
    const response = await this.autoScalingClient.send(
      new DescribeAutoScalingGroupsCommand({
        AutoScalingGroupNames: [this.groupName],
      })
    );

    const asg = response.AutoScalingGroups?.[0];
    if (!asg) {
      throw new Error(`Auto Scaling Group ${this.groupName} not found`);
    }

    const inService = (asg.Instances ?? []).filter((i) => i.LifecycleState === 'InService');

    this.logger.debug(
      {
        asgName: this.groupName,
        desired_capacity: asg.DesiredCapacity,
        instances: asg.Instances?.length ?? 0,
        in_service_instances: inService.length,
      },
      'ASG size check'
    );

    return inService.length;
  }
}
