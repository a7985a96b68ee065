/**
 * Node group scaler for GCE and GKE managed instance groups.
 *
 * Drives the group through the gcloud CLI, which is already authenticated
 * wherever these clusters are provisioned.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { SupportedProvider } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { BaseNodeGroupScaler } from './base';

/**
 * Runs an executable and resolves with its standard output.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args);
  return stdout;
};

export interface ManagedInstanceGroupOptions {
  provider: Extract<SupportedProvider, 'gce' | 'gke'>;
  groupName: string;
  project: string;
  zone: string;
  run?: CommandRunner;
}

export class ManagedInstanceGroupScaler extends BaseNodeGroupScaler {
  readonly provider: 'gce' | 'gke';
  private readonly project: string;
  private readonly zone: string;
  private readonly run: CommandRunner;

  constructor(options: ManagedInstanceGroupOptions) {
    super(options.groupName, setupLogger(`node-lease:scaler.${options.provider}`));
    this.provider = options.provider;
    this.project = options.project;
    this.zone = options.zone;
    this.run = options.run ?? runCommand;
  }

  private scopeArgs(): string[] {
    return [`--project=${this.project}`, `--zone=${this.zone}`];
  }

  async resize(size: number): Promise<void> {
    this.logger.info({ group: this.groupName, size }, 'Resizing managed instance group');

    await this.run('gcloud', [
      'compute',
      'instance-groups',
      'managed',
      'resize',
      this.groupName,
      `--size=${size}`,
      ...this.scopeArgs(),
    ]);
  }

  async getSize(): Promise<number> {
    const output = await this.run('gcloud', [
      'compute',
      'instance-groups',
      'managed',
      'list-instances',
      this.groupName,
      ...this.scopeArgs(),
      '--format=value(instanceStatus)',
    ]);

    const running = output
      .split('\n')
      .map((line) => line.trim())
      .filter((status) => status === 'RUNNING').length;

    this.logger.debug({ group: this.groupName, running }, 'Managed instance group size check');
    return running;
  }
}
