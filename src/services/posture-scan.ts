import { createChildLogger } from '../utils/logger.js';
import type { ClusterClient } from './cluster-client.js';
import type { FindingSink } from './finding-sink.js';
import {
  analyzeInsecureWorkload,
  analyzeRoleBinding,
  analyzeNetworkPolicies,
  analyzeOutdatedComponents,
  type Finding,
  type PostureRuleId,
} from './posture-rules.js';

const log = createChildLogger('posture-scan');

export const CYCLE_START_BANNER = '--- Running security checks ---';
export const CYCLE_END_BANNER = '--- Security checks complete ---';

export function formatStartBanner(namespace: string): string {
  return `Starting continuous Kubernetes monitoring service in namespace '${namespace}'`;
}

export interface ScanContext {
  namespace: string;
  /** Label selector restricting the pods the outdated components check reports on. */
  componentLabelSelector: string;
}

/** One rule bound to the cluster objects it needs. */
export interface PostureCheck {
  id: PostureRuleId;
  label: string;
  run(client: ClusterClient, context: ScanContext, sink: FindingSink): Promise<Finding[]>;
}

function emit(sink: FindingSink, findings: Finding[]): Finding[] {
  for (const finding of findings) {
    sink.writeFinding(finding);
  }
  return findings;
}

export const insecureWorkloadsCheck: PostureCheck = {
  id: 'K01',
  label: 'insecure workloads',
  async run(client, { namespace }, sink) {
    const workloads = await client.listPods(namespace);
    return emit(sink, workloads.flatMap(analyzeInsecureWorkload));
  },
};

export const permissiveRbacCheck: PostureCheck = {
  id: 'K03',
  label: 'RBAC',
  async run(client, { namespace }, sink) {
    const bindings = await client.listRoleBindings(namespace);
    const findings = bindings
      .map(analyzeRoleBinding)
      .filter((finding): finding is Finding => finding !== null);
    return emit(sink, findings);
  },
};

export const networkPoliciesCheck: PostureCheck = {
  id: 'K07',
  label: 'network policies',
  async run(client, { namespace }, sink) {
    const policies = await client.listNetworkPolicies(namespace);
    return emit(sink, [analyzeNetworkPolicies(policies)]);
  },
};

export const outdatedComponentsCheck: PostureCheck = {
  id: 'K10',
  label: 'outdated components',
  async run(client, { namespace, componentLabelSelector }, sink) {
    const workloads = await client.listPods(namespace, componentLabelSelector);
    return emit(sink, workloads.flatMap(analyzeOutdatedComponents));
  },
};

export const POSTURE_CHECKS: readonly PostureCheck[] = [
  insecureWorkloadsCheck,
  permissiveRbacCheck,
  networkPoliciesCheck,
  outdatedComponentsCheck,
];

export interface ScanCycleResult {
  findings: Partial<Record<PostureRuleId, Finding[]>>;
  errors: Partial<Record<PostureRuleId, string>>;
  durationMs: number;
}

/**
 * Runs every check once, concurrently. A check whose fetch fails is logged and
 * recorded in `errors`; the others still complete. Never rejects.
 */
export async function runScanCycle(
  client: ClusterClient,
  context: ScanContext,
  sink: FindingSink,
  checks: readonly PostureCheck[] = POSTURE_CHECKS,
): Promise<ScanCycleResult> {
  const startTime = Date.now();
  sink.writeBanner(CYCLE_START_BANNER);

  const results = await Promise.allSettled(checks.map((check) => check.run(client, context, sink)));

  const cycle: ScanCycleResult = { findings: {}, errors: {}, durationMs: 0 };
  results.forEach((result, i) => {
    const check = checks[i];
    if (result.status === 'fulfilled') {
      cycle.findings[check.id] = result.value;
      return;
    }
    const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
    cycle.errors[check.id] = message;
    log.error({ rule: check.id, namespace: context.namespace, err: result.reason }, `Error in ${check.label} check`);
  });

  sink.writeBanner(CYCLE_END_BANNER);
  sink.writeBanner('');

  cycle.durationMs = Date.now() - startTime;
  log.debug(
    {
      namespace: context.namespace,
      durationMs: cycle.durationMs,
      failedChecks: Object.keys(cycle.errors).length,
    },
    'Scan cycle finished',
  );
  return cycle;
}
