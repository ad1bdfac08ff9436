import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('scheduler');

export type CycleRunner = () => Promise<unknown>;

let timer: NodeJS.Timeout | null = null;
let active = false;
// Bumped on every start and stop; a tick only reschedules while its generation is current
let generation = 0;

// ---------------------------------------------------------------------------
// Mutex guard — prevents overlapping scan cycles across a stop/start
// ---------------------------------------------------------------------------
let currentCycle: Promise<void> | null = null;

/** Exposed for testing — check whether a cycle is currently in progress. */
export function isScanCycleRunning(): boolean {
  return currentCycle !== null;
}

/** Exposed for testing — forcibly reset the mutex (e.g. between test runs). */
export function _resetScanMutex(): void {
  currentCycle = null;
}

async function executeCycle(runCycle: CycleRunner): Promise<void> {
  const startTime = Date.now();
  try {
    await runCycle();
    log.debug({ durationMs: Date.now() - startTime }, 'Scan cycle completed');
  } catch (err) {
    log.error({ err }, 'Scan cycle failed');
  }
}

/** Runs one cycle unless one is already in flight. Errors are logged, never thrown. */
export function runGuardedCycle(runCycle: CycleRunner): Promise<void> {
  if (currentCycle) {
    log.warn('Scan cycle still running, skipping this tick');
    return Promise.resolve();
  }
  const cycle: Promise<void> = executeCycle(runCycle).finally(() => {
    if (currentCycle === cycle) currentCycle = null;
  });
  currentCycle = cycle;
  return cycle;
}

/**
 * Runs a cycle now, then waits `intervalMs` after each cycle completes before
 * starting the next. A slow cycle pushes the next start back; cycles never overlap.
 */
export function startScheduler(runCycle: CycleRunner, intervalMs: number): void {
  if (active) {
    log.warn('Scheduler already started');
    return;
  }
  active = true;
  const tickGeneration = ++generation;

  const tick = async (): Promise<void> => {
    timer = null;
    await runGuardedCycle(runCycle);
    if (tickGeneration === generation) {
      timer = setTimeout(() => void tick(), intervalMs);
    }
  };

  log.info({ intervalMs }, 'Scan scheduler started');
  void tick();
}

/**
 * Cancels the next cycle and resolves once the cycle already running, if any,
 * has finished.
 */
export async function stopScheduler(): Promise<void> {
  active = false;
  generation++;
  if (timer) {
    clearTimeout(timer);
    timer = null;
  }
  log.info('Scan scheduler stopped');
  if (currentCycle) {
    await currentCycle;
  }
}
