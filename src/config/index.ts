import { existsSync } from 'node:fs';
import { envSchema, type EnvConfig } from './env.schema.js';

let config: EnvConfig | null = null;

function validateKubeconfigPath(data: EnvConfig): void {
  if (data.KUBECONFIG_PATH && !existsSync(data.KUBECONFIG_PATH)) {
    throw new Error(
      `Invalid environment configuration:\n  KUBECONFIG_PATH: file not found: ${data.KUBECONFIG_PATH}`
    );
  }
}

export function getConfig(): EnvConfig {
  if (!config) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `  ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new Error(`Invalid environment configuration:\n${errors}`);
    }
    validateKubeconfigPath(result.data);
    config = result.data;
  }
  return config;
}

export function resetConfig(): void {
  config = null;
}

/**
 * Override specific config values for a test. Call resetConfig() in afterEach.
 * Throws if called outside the test environment.
 */
export function setConfigForTest(partial: Partial<EnvConfig>): void {
  if (process.env.NODE_ENV !== 'test') {
    throw new Error('setConfigForTest can only be called in the test environment');
  }
  config = { ...getConfig(), ...partial };
}

export type { EnvConfig };
