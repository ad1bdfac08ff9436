#!/usr/bin/env node
import { getConfig } from './config/index.js';
import { createChildLogger } from './utils/logger.js';
import { createClusterClient } from './services/cluster-client.js';
import { StreamFindingSink } from './services/finding-sink.js';
import { runScanCycle, formatStartBanner, type ScanContext } from './services/posture-scan.js';
import { startScheduler, stopScheduler } from './scheduler/setup.js';

const log = createChildLogger('monitor');

// Safety net: log unhandled rejections instead of crashing the process
process.on('unhandledRejection', (reason) => {
  log.error({ err: reason }, 'Unhandled promise rejection (process kept alive)');
});

async function main(): Promise<void> {
  const config = getConfig();
  const client = createClusterClient({
    kubeconfigPath: config.KUBECONFIG_PATH,
    requestTimeoutMs: config.KUBE_REQUEST_TIMEOUT_MS,
  });
  const sink = new StreamFindingSink(process.stdout);
  const context: ScanContext = {
    namespace: config.SCAN_NAMESPACE,
    componentLabelSelector: config.OUTDATED_COMPONENTS_LABEL_SELECTOR,
  };

  if (config.SCAN_RUN_ONCE) {
    const result = await runScanCycle(client, context, sink);
    log.info({ namespace: context.namespace, failedChecks: Object.keys(result.errors) }, 'Single scan finished');
    return;
  }

  sink.writeBanner(formatStartBanner(context.namespace));
  log.info(
    { namespace: context.namespace, intervalSeconds: config.SCAN_INTERVAL_SECONDS },
    'Posture monitor started',
  );
  startScheduler(() => runScanCycle(client, context, sink), config.SCAN_INTERVAL_SECONDS * 1000);

  // Graceful shutdown: the running cycle finishes writing before the process exits
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Received shutdown signal');
    try {
      await stopScheduler();
      log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start posture monitor');
  process.exit(1);
});
