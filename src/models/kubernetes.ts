import { z } from 'zod';

/*
 * Subset of the Kubernetes API objects the posture rules read. Anything else the
 * API returns is stripped during parsing.
 */

export const ObjectMetaSchema = z.object({
  name: z.string().nullish(),
});

export const SecurityContextSchema = z.object({
  runAsNonRoot: z.boolean().nullish(),
  privileged: z.boolean().nullish(),
});

export const ContainerSchema = z.object({
  name: z.string(),
  image: z.string().nullish(),
  securityContext: SecurityContextSchema.nullish(),
});

export const PodSchema = z.object({
  metadata: ObjectMetaSchema.nullish(),
  spec: z.object({
    containers: z.array(ContainerSchema),
  }).nullish(),
});

export const RoleRefSchema = z.object({
  apiGroup: z.string().nullish(),
  kind: z.string(),
  name: z.string(),
});

export const RoleBindingSchema = z.object({
  metadata: ObjectMetaSchema.nullish(),
  roleRef: RoleRefSchema,
});

export const NetworkPolicySchema = z.object({
  metadata: ObjectMetaSchema.nullish(),
});

export const PodArraySchema = z.array(PodSchema);
export const RoleBindingArraySchema = z.array(RoleBindingSchema);
export const NetworkPolicyArraySchema = z.array(NetworkPolicySchema);

export type Pod = z.infer<typeof PodSchema>;
export type PodContainer = z.infer<typeof ContainerSchema>;
export type RoleBinding = z.infer<typeof RoleBindingSchema>;
export type NetworkPolicy = z.infer<typeof NetworkPolicySchema>;

// ---------------------------------------------------------------------------
// Records handed to the posture rules
// ---------------------------------------------------------------------------

/** Per-container privilege settings. An absent field means "not set", which is not the same as `false`. */
export interface SecurityProfile {
  runAsNonRoot?: boolean;
  privileged?: boolean;
}

export interface ContainerRecord {
  name: string;
  image?: string;
  securityProfile?: SecurityProfile;
}

export interface WorkloadRecord {
  name: string;
  containers: ContainerRecord[];
}

export interface RoleReference {
  kind: string;
  name: string;
}

export interface RoleBindingRecord {
  name: string;
  roleRef: RoleReference;
}

export interface NetworkPolicyRecord {
  name: string;
}
