import { z } from 'zod';

// RFC 1123 label, the format Kubernetes enforces for namespace names
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const envSchema = z.object({
  // Scan target
  SCAN_NAMESPACE: z.string().max(63).regex(NAMESPACE_PATTERN, 'must be a valid namespace name').default('airflow'),
  SCAN_INTERVAL_SECONDS: z.coerce.number().int().min(1).max(86400).default(30),
  SCAN_RUN_ONCE: z.string().default('false').transform((v) => v === 'true' || v === '1'),

  // Pods matching this selector are reported by the outdated components check
  OUTDATED_COMPONENTS_LABEL_SELECTOR: z.string().min(1).default('component=webserver'),

  // Cluster access
  KUBECONFIG_PATH: z.string().min(1).optional(),
  KUBE_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(10000),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;
