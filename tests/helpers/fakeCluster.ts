/**
 * In-process stand-in for a cluster and its node group.
 *
 * Leases are reconciled lazily: a removed node's lease survives a
 * configurable number of reads before it disappears, mimicking the
 * controller that garbage collects it.
 */

import { vi } from 'vitest';
import type {
  ClusterHandle,
  ClusterInspector,
  Lease,
  LeaseRegistry,
  NodeGroupScaler,
  NodeSet,
  SuiteConfig,
  SupportedProvider,
} from '@shared/types';
import { createMockConfig } from './fixtures';

export interface FakeClusterOptions {
  nodes?: string[];
  provider?: SupportedProvider;
  /**
   * Nodes removed, in order, when the group shrinks.
   */
  shrinkVictims?: string[];
  /**
   * Nodes added when the group shrinks, to model a replaced instance.
   */
  shrinkReplacements?: string[];
  /**
   * Reads of a removed node's lease that still return it.
   */
  leaseDeletionLag?: number;
  systemPods?: number;
}

export class FakeCluster implements NodeGroupScaler, LeaseRegistry, ClusterInspector {
  readonly provider: SupportedProvider;
  readonly groupName = 'test-node-group';
  nodes: string[];
  readonly leases = new Set<string>();
  readonly unschedulable = new Set<string>();
  readonly calls: string[] = [];
  systemPods: number;
  readyPods: number;
  private readonly pendingDeletion = new Map<string, number>();
  private readonly shrinkVictims: string[];
  private readonly shrinkReplacements: string[];
  private readonly leaseDeletionLag: number;
  private restoredCount = 0;

  constructor(options: FakeClusterOptions = {}) {
    this.nodes = [...(options.nodes ?? ['node-a', 'node-b', 'node-c', 'node-d'])];
    this.nodes.forEach((n) => this.leases.add(n));
    this.provider = options.provider ?? 'aws';
    this.shrinkVictims = options.shrinkVictims ?? ['node-b'];
    this.shrinkReplacements = options.shrinkReplacements ?? [];
    this.leaseDeletionLag = options.leaseDeletionLag ?? 0;
    this.systemPods = options.systemPods ?? 6;
    this.readyPods = this.systemPods;
  }

  async resize(size: number): Promise<void> {
    this.calls.push(`resize:${size}`);

    if (size < this.nodes.length) {
      const victims = this.shrinkVictims.slice(0, this.nodes.length - size + this.shrinkReplacements.length);
      this.nodes = this.nodes.filter((n) => !victims.includes(n));
      victims.forEach((n) => this.pendingDeletion.set(n, this.leaseDeletionLag));
      this.shrinkReplacements.forEach((n) => {
        this.nodes.push(n);
        this.leases.add(n);
      });
      return;
    }

    while (this.nodes.length < size) {
      this.restoredCount += 1;
      const name = `node-restored-${this.restoredCount}`;
      this.nodes.push(name);
      this.leases.add(name);
    }
  }

  async getSize(): Promise<number> {
    return this.nodes.length;
  }

  async waitForSize(size: number): Promise<void> {
    this.calls.push(`waitForSize:${size}`);
    if (this.nodes.length !== size) {
      throw new Error(`group has ${this.nodes.length} instances, want ${size}`);
    }
  }

  async get(nodeName: string): Promise<Lease | undefined> {
    const remaining = this.pendingDeletion.get(nodeName);
    if (remaining !== undefined) {
      if (remaining <= 0) {
        this.pendingDeletion.delete(nodeName);
        this.leases.delete(nodeName);
      } else {
        this.pendingDeletion.set(nodeName, remaining - 1);
      }
    }
    return this.leases.has(nodeName) ? { nodeName, holderIdentity: nodeName } : undefined;
  }

  async listReadySchedulableNodes(): Promise<NodeSet> {
    return this.nodes
      .filter((name) => !this.unschedulable.has(name))
      .map((name) => ({ name, ready: true, schedulable: true }));
  }

  async waitForReadyNodes(count: number): Promise<void> {
    this.calls.push(`waitForReadyNodes:${count}`);
    if (this.nodes.length !== count) {
      throw new Error(`Cluster has ${this.nodes.length} nodes, want ${count}`);
    }
  }

  async countRunningReadyPods(): Promise<number> {
    this.calls.push('countRunningReadyPods');
    return this.systemPods;
  }

  async waitForPodsRunningReady(namespace: string, minPods: number, allowedNotReady: number): Promise<void> {
    this.calls.push(`waitForPodsRunningReady:${namespace}:${minPods}:${allowedNotReady}`);
    if (this.readyPods < minPods) {
      throw new Error(`${this.readyPods} / ${minPods} pods in ${namespace} running and ready`);
    }
  }

  /**
   * Handle that routes every collaborator to this fake.
   */
  handle(config: SuiteConfig = createMockConfig({ provider: this.provider })): ClusterHandle {
    return {
      config,
      scaler: this,
      leases: this,
      inspector: this,
      delay: vi.fn(async () => undefined),
    };
  }
}
