import { afterEach, describe, it, expect, vi } from 'vitest';

const mockLog = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../utils/logger.js', () => ({
  createChildLogger: () => mockLog,
}));

import { KubernetesClusterClient, ClusterFetchError, type KubernetesApis } from './cluster-client.js';

function createApis(overrides: Partial<Record<'pods' | 'rolebindings' | 'networkpolicies', unknown>> = {}) {
  const listNamespacedPod = vi.fn().mockResolvedValue({ items: overrides.pods ?? [] });
  const listNamespacedRoleBinding = vi.fn().mockResolvedValue({ items: overrides.rolebindings ?? [] });
  const listNamespacedNetworkPolicy = vi.fn().mockResolvedValue({ items: overrides.networkpolicies ?? [] });
  const apis: KubernetesApis = {
    core: { listNamespacedPod },
    rbac: { listNamespacedRoleBinding },
    networking: { listNamespacedNetworkPolicy },
  };
  return { apis, listNamespacedPod, listNamespacedRoleBinding, listNamespacedNetworkPolicy };
}

describe('cluster-client', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('lists pods in the namespace and normalizes them', async () => {
    const { apis, listNamespacedPod } = createApis({
      pods: [
        {
          metadata: { name: 'airflow-web-0', namespace: 'airflow' },
          spec: {
            containers: [
              { name: 'web', image: 'apache/airflow:2.5.1', securityContext: { privileged: true } },
            ],
          },
        },
      ],
    });
    const client = new KubernetesClusterClient(apis, 5000);

    const pods = await client.listPods('airflow', 'component=webserver');

    expect(listNamespacedPod).toHaveBeenCalledWith({ namespace: 'airflow', labelSelector: 'component=webserver' });
    expect(pods).toEqual([
      {
        name: 'airflow-web-0',
        containers: [{ name: 'web', image: 'apache/airflow:2.5.1', securityProfile: { privileged: true } }],
      },
    ]);
  });

  it('passes no label selector when none is given', async () => {
    const { apis, listNamespacedPod } = createApis();
    const client = new KubernetesClusterClient(apis, 5000);

    await client.listPods('airflow');

    expect(listNamespacedPod).toHaveBeenCalledWith({ namespace: 'airflow', labelSelector: undefined });
  });

  it('lists role bindings and network policies', async () => {
    const { apis, listNamespacedRoleBinding, listNamespacedNetworkPolicy } = createApis({
      rolebindings: [
        { metadata: { name: 'rb1' }, roleRef: { apiGroup: 'rbac.authorization.k8s.io', kind: 'ClusterRole', name: 'view' } },
      ],
      networkpolicies: [{ metadata: { name: 'np1' } }, { metadata: { name: 'np2' } }],
    });
    const client = new KubernetesClusterClient(apis, 5000);

    await expect(client.listRoleBindings('airflow')).resolves.toEqual([
      { name: 'rb1', roleRef: { kind: 'ClusterRole', name: 'view' } },
    ]);
    await expect(client.listNetworkPolicies('airflow')).resolves.toEqual([{ name: 'np1' }, { name: 'np2' }]);
    expect(listNamespacedRoleBinding).toHaveBeenCalledWith({ namespace: 'airflow' });
    expect(listNamespacedNetworkPolicy).toHaveBeenCalledWith({ namespace: 'airflow' });
  });

  it('wraps API failures in ClusterFetchError', async () => {
    const { apis, listNamespacedRoleBinding } = createApis();
    const cause = new Error('connect ECONNREFUSED 10.0.0.1:6443');
    listNamespacedRoleBinding.mockRejectedValue(cause);
    const client = new KubernetesClusterClient(apis, 5000);

    const err = await client.listRoleBindings('airflow').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ClusterFetchError);
    expect(err).toMatchObject({
      name: 'ClusterFetchError',
      resource: 'rolebindings',
      namespace: 'airflow',
      message: 'Failed to list rolebindings in namespace "airflow": connect ECONNREFUSED 10.0.0.1:6443',
      cause,
    });
  });

  it('treats a malformed API object as a fetch failure', async () => {
    const { apis } = createApis({ rolebindings: [{ metadata: { name: 'no-role-ref' } }] });
    const client = new KubernetesClusterClient(apis, 5000);

    await expect(client.listRoleBindings('airflow')).rejects.toBeInstanceOf(ClusterFetchError);
  });

  it('times out a list call that never answers', async () => {
    vi.useFakeTimers();
    const { apis, listNamespacedNetworkPolicy } = createApis();
    listNamespacedNetworkPolicy.mockReturnValue(new Promise(() => {}));
    const client = new KubernetesClusterClient(apis, 1000);

    const pending = expect(client.listNetworkPolicies('airflow')).rejects.toThrow(
      'Failed to list networkpolicies in namespace "airflow": list networkpolicies timed out after 1000ms',
    );
    await vi.advanceTimersByTimeAsync(1000);
    await pending;
  });

  it('discards the late answer of a timed-out list call', async () => {
    vi.useFakeTimers();
    vi.clearAllMocks();
    const { apis, listNamespacedPod } = createApis();
    let fail: (err: Error) => void = () => {};
    listNamespacedPod.mockReturnValue(new Promise((_, reject) => { fail = reject; }));
    const client = new KubernetesClusterClient(apis, 1000);

    const pending = expect(client.listPods('airflow')).rejects.toBeInstanceOf(ClusterFetchError);
    await vi.advanceTimersByTimeAsync(1000);
    await pending;

    // a rejection arriving after the timeout is already handled by the race
    fail(new Error('socket hang up'));
    await vi.advanceTimersByTimeAsync(0);
    expect(mockLog.debug).not.toHaveBeenCalled();
  });
});
