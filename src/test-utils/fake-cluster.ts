/**
 * In-process stand-ins for the cluster client and the finding sink.
 *
 * Usage:
 *   const cluster = new FakeClusterClient({ pods: [...], roleBindings: [...] });
 *   await runScanCycle(cluster, context, new MemoryFindingSink());
 */
import type { ClusterClient } from '../services/cluster-client.js';
import type { FindingSink } from '../services/finding-sink.js';
import type { Finding } from '../services/posture-rules.js';
import type {
  WorkloadRecord,
  RoleBindingRecord,
  NetworkPolicyRecord,
} from '../models/kubernetes.js';

export interface FakeClusterState {
  pods?: WorkloadRecord[];
  /** Pods returned for a given label selector; unknown selectors return an empty list. */
  podsBySelector?: Record<string, WorkloadRecord[]>;
  roleBindings?: RoleBindingRecord[];
  networkPolicies?: NetworkPolicyRecord[];
  failures?: Partial<Record<'pods' | 'rolebindings' | 'networkpolicies', Error>>;
}

export interface FakeListCall {
  resource: 'pods' | 'rolebindings' | 'networkpolicies';
  namespace: string;
  labelSelector?: string;
}

export class FakeClusterClient implements ClusterClient {
  readonly calls: FakeListCall[] = [];

  constructor(private readonly state: FakeClusterState = {}) {}

  async listPods(namespace: string, labelSelector?: string): Promise<WorkloadRecord[]> {
    this.calls.push({ resource: 'pods', namespace, labelSelector });
    if (this.state.failures?.pods) throw this.state.failures.pods;
    if (labelSelector !== undefined) return this.state.podsBySelector?.[labelSelector] ?? [];
    return this.state.pods ?? [];
  }

  async listRoleBindings(namespace: string): Promise<RoleBindingRecord[]> {
    this.calls.push({ resource: 'rolebindings', namespace });
    if (this.state.failures?.rolebindings) throw this.state.failures.rolebindings;
    return this.state.roleBindings ?? [];
  }

  async listNetworkPolicies(namespace: string): Promise<NetworkPolicyRecord[]> {
    this.calls.push({ resource: 'networkpolicies', namespace });
    if (this.state.failures?.networkpolicies) throw this.state.failures.networkpolicies;
    return this.state.networkPolicies ?? [];
  }
}

/** Collects sink output in memory. */
export class MemoryFindingSink implements FindingSink {
  readonly lines: string[] = [];
  readonly findings: Finding[] = [];

  writeFinding(finding: Finding): void {
    this.findings.push(finding);
    this.lines.push(finding);
  }

  writeBanner(text: string): void {
    this.lines.push(text);
  }
}
