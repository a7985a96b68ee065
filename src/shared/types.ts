/**
 * Core type definitions for the node lease lifecycle suite.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Cloud providers whose node groups can be resized by this suite.
 */
export const SUPPORTED_PROVIDERS = ['gce', 'gke', 'aws'] as const;

export type SupportedProvider = (typeof SUPPORTED_PROVIDERS)[number];

/**
 * A cluster node as observed through the Kubernetes API.
 */
export interface ClusterNode {
  name: string;
  ready: boolean;
  schedulable: boolean;
}

/**
 * Immutable, ordered snapshot of nodes captured at a point in time.
 */
export type NodeSet = readonly ClusterNode[];

/**
 * Per-node heartbeat record. Identity is the node name.
 */
export interface Lease {
  nodeName: string;
  holderIdentity?: string;
  renewTime?: Date;
}

/**
 * Read access to node leases.
 *
 * Absence is reported as `undefined`, not as an error.
 */
export interface LeaseRegistry {
  get(nodeName: string): Promise<Lease | undefined>;
}

/**
 * Control plane of a single node group.
 *
 * `resize` only records intent; callers pair it with `waitForSize`
 * before relying on the new size.
 */
export interface NodeGroupScaler {
  readonly provider: SupportedProvider;
  readonly groupName: string;

  resize(size: number): Promise<void>;

  /**
   * Number of instances currently running in the group.
   */
  getSize(): Promise<number>;

  waitForSize(size: number, timeoutMs: number): Promise<void>;
}

/**
 * Cluster-side observations used as the node-count and pod-health oracle.
 */
export interface ClusterInspector {
  /**
   * Nodes that are both Ready and schedulable.
   */
  listReadySchedulableNodes(): Promise<NodeSet>;

  waitForReadyNodes(count: number, timeoutMs: number): Promise<void>;

  /**
   * Pods in `namespace` that are running and ready, the count a later
   * `waitForPodsRunningReady` can be held to.
   */
  countRunningReadyPods(namespace: string): Promise<number>;

  waitForPodsRunningReady(
    namespace: string,
    minPods: number,
    allowedNotReady: number,
    timeoutMs: number
  ): Promise<void>;
}

/**
 * Injectable pause, used for provider workarounds that cannot be polled.
 */
export type DelayFn = (ms: number) => Promise<void>;

/**
 * Timeouts and intervals, all in milliseconds.
 */
export interface SuiteTimeouts {
  leasePoll: number;
  leasePollInterval: number;
  nodeReady: number;
  groupResize: number;
  podReady: number;
  tunnelGrace: number;
}

/**
 * Validated suite configuration.
 */
export interface SuiteConfig {
  provider: string;
  numNodes: number;
  nodeInstanceGroup: string;
  region?: string;
  project?: string;
  zone?: string;
  kubeconfig?: string;
  context?: string;
  namespaces: {
    lease: string;
    system: string;
  };
  timeouts: SuiteTimeouts;
}

/**
 * Everything the scenario may touch, passed explicitly instead of
 * living in ambient client state.
 */
export interface ClusterHandle {
  config: SuiteConfig;
  scaler: NodeGroupScaler;
  leases: LeaseRegistry;
  inspector: ClusterInspector;
  delay: DelayFn;
}

/**
 * Outcome of the capability check run before the scenario.
 */
export type GuardDecision =
  | { decision: 'run'; provider: SupportedProvider }
  | { decision: 'skip'; reason: string }
  | { decision: 'fail-config'; reason: string };

/**
 * States of the scenario state machine.
 */
export type ScenarioPhase =
  | 'init'
  | 'baseline-wait'
  | 'baseline-lease-check'
  | 'disrupt'
  | 'identify-removed'
  | 'deletion-check'
  | 'survivor-check'
  | 'done'
  | 'failed';

export type ScenarioOutcome = 'passed' | 'failed' | 'skipped';

/**
 * Summary of one scenario run.
 */
export interface ScenarioReport {
  outcome: ScenarioOutcome;
  /**
   * Last phase entered. For failures this is the phase that failed.
   */
  phase: ScenarioPhase;
  message: string;
  baselineNodes: string[];
  remainingNodes: string[];
  removedNode?: string;
  durationMs: number;
}

/**
 * Values captured during setup and needed again by the restore step.
 */
export interface ClusterBaseline {
  numNodes: number;
  systemPods: number;
}
