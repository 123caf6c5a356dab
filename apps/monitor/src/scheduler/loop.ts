import { unixNow, type MonitorDeps } from '../deps';
import { isMonitorError, toErrorMessage } from '../errors';
import { runScheduledTick } from './scheduled';

export type LoopOptions = {
  intervalSeconds: number;
  signal: AbortSignal;
  now?: () => number;
};

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(t);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const t = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

// Completion-based: the next tick starts one interval after the previous one started, or
// immediately when a tick overran. Abort stops the loop after the in-flight tick.
export async function runLoop(deps: MonitorDeps, opts: LoopOptions): Promise<number> {
  const now = opts.now ?? unixNow;
  const intervalMs = opts.intervalSeconds * 1000;
  let ticks = 0;

  console.log(
    `loop: started interval=${opts.intervalSeconds}s endpoints=${deps.config.endpoints.length}`,
  );

  while (!opts.signal.aborted) {
    const started = performance.now();
    try {
      await runScheduledTick(deps, now());
    } catch (err) {
      const code = isMonitorError(err) ? err.code : 'UNKNOWN';
      console.error(`loop: tick failed code=${code} ${toErrorMessage(err)}`);
    }
    ticks++;

    const elapsedMs = performance.now() - started;
    const waitMs = intervalMs - elapsedMs;
    if (waitMs <= 0) {
      console.warn(
        `loop: tick took ${Math.round(elapsedMs)}ms, longer than the ${intervalMs}ms interval`,
      );
      continue;
    }
    await sleep(waitMs, opts.signal);
  }

  console.log(`loop: stopped after ${ticks} ticks`);
  return ticks;
}
