import type {
  Pod,
  PodContainer,
  RoleBinding,
  NetworkPolicy,
  WorkloadRecord,
  ContainerRecord,
  SecurityProfile,
  RoleBindingRecord,
  NetworkPolicyRecord,
} from '../models/kubernetes.js';

export const UNKNOWN_OBJECT_NAME = '<unknown>';

function toObjectName(metadata: { name?: string | null } | null | undefined): string {
  return metadata?.name ?? UNKNOWN_OBJECT_NAME;
}

function normalizeSecurityProfile(container: PodContainer): SecurityProfile | undefined {
  const sc = container.securityContext;
  if (!sc) return undefined;

  // Keep unset fields unset; only explicit booleans are copied
  const profile: SecurityProfile = {};
  if (typeof sc.runAsNonRoot === 'boolean') profile.runAsNonRoot = sc.runAsNonRoot;
  if (typeof sc.privileged === 'boolean') profile.privileged = sc.privileged;
  return profile;
}

export function normalizeContainer(container: PodContainer): ContainerRecord {
  const record: ContainerRecord = { name: container.name };
  if (container.image != null) record.image = container.image;
  const securityProfile = normalizeSecurityProfile(container);
  if (securityProfile) record.securityProfile = securityProfile;
  return record;
}

export function normalizeWorkload(pod: Pod): WorkloadRecord {
  return {
    name: toObjectName(pod.metadata),
    containers: (pod.spec?.containers ?? []).map(normalizeContainer),
  };
}

export function normalizeRoleBinding(binding: RoleBinding): RoleBindingRecord {
  return {
    name: toObjectName(binding.metadata),
    roleRef: { kind: binding.roleRef.kind, name: binding.roleRef.name },
  };
}

export function normalizeNetworkPolicy(policy: NetworkPolicy): NetworkPolicyRecord {
  return { name: toObjectName(policy.metadata) };
}
