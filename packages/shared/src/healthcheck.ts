import { writeFile } from 'node:fs/promises';
import { createLogger } from './logger';

const logger = createLogger({ name: 'healthcheck' });

export async function touchHealthFile(path: string): Promise<void> {
  await writeFile(path, new Date().toISOString(), 'utf-8');
}

/** Rewrites the heartbeat file on an interval so a container probe can check its mtime. */
export function startHealthBeat(intervalMs: number, path: string): { stop: () => void } {
  const tick = () => {
    touchHealthFile(path).catch((err: unknown) => {
      logger.warn({ err: err instanceof Error ? err.message : String(err), path }, 'Failed to write health file');
    });
  };
  tick();
  const timer = setInterval(tick, intervalMs);
  return {
    stop: () => clearInterval(timer),
  };
}
