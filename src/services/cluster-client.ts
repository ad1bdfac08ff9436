import * as k8s from '@kubernetes/client-node';
import { createChildLogger } from '../utils/logger.js';
import {
  PodArraySchema,
  RoleBindingArraySchema,
  NetworkPolicyArraySchema,
  type WorkloadRecord,
  type RoleBindingRecord,
  type NetworkPolicyRecord,
} from '../models/kubernetes.js';
import { normalizeWorkload, normalizeRoleBinding, normalizeNetworkPolicy } from './cluster-normalizers.js';

const log = createChildLogger('cluster-client');

export type ClusterResource = 'pods' | 'rolebindings' | 'networkpolicies';

/**
 * Read-only view of the cluster used by the posture checks. Every list call is
 * scoped to one namespace and resolves to records in API order.
 */
export interface ClusterClient {
  listPods(namespace: string, labelSelector?: string): Promise<WorkloadRecord[]>;
  listRoleBindings(namespace: string): Promise<RoleBindingRecord[]>;
  listNetworkPolicies(namespace: string): Promise<NetworkPolicyRecord[]>;
}

export class ClusterFetchError extends Error {
  constructor(
    message: string,
    public readonly resource: ClusterResource,
    public readonly namespace: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ClusterFetchError';
  }
}

/** The generated API methods the client calls, narrowed so tests can stand them in. */
export interface KubernetesApis {
  core: Pick<k8s.CoreV1Api, 'listNamespacedPod'>;
  rbac: Pick<k8s.RbacAuthorizationV1Api, 'listNamespacedRoleBinding'>;
  networking: Pick<k8s.NetworkingV1Api, 'listNamespacedNetworkPolicy'>;
}

// The generated API methods take no abort signal, so a request that loses the race keeps
// running until the API server or socket ends it; its late result or error is discarded.
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class KubernetesClusterClient implements ClusterClient {
  constructor(
    private readonly apis: KubernetesApis,
    private readonly requestTimeoutMs: number,
  ) {}

  private async list<T>(
    resource: ClusterResource,
    namespace: string,
    fetchItems: () => Promise<T[]>,
  ): Promise<T[]> {
    try {
      const items = await withTimeout(fetchItems(), this.requestTimeoutMs, `list ${resource}`);
      log.debug({ resource, namespace, count: items.length }, 'Listed cluster objects');
      return items;
    } catch (err) {
      throw new ClusterFetchError(
        `Failed to list ${resource} in namespace "${namespace}": ${describeError(err)}`,
        resource,
        namespace,
        { cause: err },
      );
    }
  }

  listPods(namespace: string, labelSelector?: string): Promise<WorkloadRecord[]> {
    return this.list('pods', namespace, async () => {
      const response = await this.apis.core.listNamespacedPod({ namespace, labelSelector });
      return PodArraySchema.parse(response.items).map(normalizeWorkload);
    });
  }

  listRoleBindings(namespace: string): Promise<RoleBindingRecord[]> {
    return this.list('rolebindings', namespace, async () => {
      const response = await this.apis.rbac.listNamespacedRoleBinding({ namespace });
      return RoleBindingArraySchema.parse(response.items).map(normalizeRoleBinding);
    });
  }

  listNetworkPolicies(namespace: string): Promise<NetworkPolicyRecord[]> {
    return this.list('networkpolicies', namespace, async () => {
      const response = await this.apis.networking.listNamespacedNetworkPolicy({ namespace });
      return NetworkPolicyArraySchema.parse(response.items).map(normalizeNetworkPolicy);
    });
  }
}

export interface ClusterClientOptions {
  kubeconfigPath?: string;
  requestTimeoutMs: number;
}

/**
 * Builds a client from an explicit kubeconfig file, or from the default chain
 * (KUBECONFIG, ~/.kube/config, in-cluster service account).
 */
export function createClusterClient(options: ClusterClientOptions): KubernetesClusterClient {
  const kc = new k8s.KubeConfig();
  if (options.kubeconfigPath) {
    kc.loadFromFile(options.kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  const cluster = kc.getCurrentCluster();
  if (!cluster) {
    throw new Error('No Kubernetes cluster found in the loaded kubeconfig');
  }
  log.info({ cluster: cluster.name, context: kc.getCurrentContext() }, 'Loaded cluster credentials');

  return new KubernetesClusterClient(
    {
      core: kc.makeApiClient(k8s.CoreV1Api),
      rbac: kc.makeApiClient(k8s.RbacAuthorizationV1Api),
      networking: kc.makeApiClient(k8s.NetworkingV1Api),
    },
    options.requestTimeoutMs,
  );
}
