import type {
  WorkloadRecord,
  RoleBindingRecord,
  NetworkPolicyRecord,
} from '../models/kubernetes.js';

/** A rule-tagged diagnostic line, e.g. `[K07] Found 2 NetworkPolicy object(s).` */
export type Finding = string;

export type PostureRuleId = 'K01' | 'K03' | 'K07' | 'K10';

function containerFinding(rule: PostureRuleId, podName: string, containerName: string, message: string): Finding {
  return `[${rule}] Pod '${podName}' container '${containerName}' ${message}`;
}

/**
 * K01: insecure workload configuration.
 *
 * Per container, in order: a missing security context is reported on its own;
 * otherwise the runAsNonRoot check runs first and the privileged check second,
 * and both may fire for the same container.
 */
export function analyzeInsecureWorkload(workload: WorkloadRecord): Finding[] {
  const findings: Finding[] = [];

  for (const container of workload.containers) {
    const profile = container.securityProfile;
    if (!profile) {
      findings.push(containerFinding('K01', workload.name, container.name, 'has no security context defined'));
      continue;
    }

    if (profile.runAsNonRoot === undefined) {
      findings.push(containerFinding('K01', workload.name, container.name, 'has no runAsNonRoot setting'));
    } else if (profile.runAsNonRoot === false) {
      findings.push(
        containerFinding('K01', workload.name, container.name, 'may run as root (runAsNonRoot is false)'),
      );
    }

    if (profile.privileged === true) {
      findings.push(containerFinding('K01', workload.name, container.name, 'is running in privileged mode'));
    }
  }

  return findings;
}

const HIGH_PRIVILEGE_ROLE_MARKER = 'cluster-admin';

/** K03: a RoleBinding granting a ClusterRole whose name contains "cluster-admin" (any case). */
export function analyzeRoleBinding(binding: RoleBindingRecord): Finding | null {
  const { kind, name } = binding.roleRef;
  if (kind !== 'ClusterRole' || !name.toLowerCase().includes(HIGH_PRIVILEGE_ROLE_MARKER)) {
    return null;
  }
  return `[K03] RoleBinding '${binding.name}' binds a high-privilege ClusterRole '${name}'`;
}

/** K07: summarizes the namespace's NetworkPolicies. Always exactly one finding. */
export function analyzeNetworkPolicies(policies: readonly NetworkPolicyRecord[]): Finding {
  if (policies.length === 0) {
    return '[K07] No NetworkPolicies found. Consider implementing network segmentation controls.';
  }
  return `[K07] Found ${policies.length} NetworkPolicy object(s).`;
}

// Reporting pass only: lists each container image, no version or CVE comparison.
export function analyzeOutdatedComponents(workload: WorkloadRecord): Finding[] {
  const findings: Finding[] = [];
  for (const container of workload.containers) {
    if (container.image === undefined) continue;
    findings.push(containerFinding('K10', workload.name, container.name, `is running image '${container.image}'`));
  }
  return findings;
}
