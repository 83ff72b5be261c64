const MIN_SLEEP_MS = 1;

function sanitizeFpsCap(fpsCap: number): number {
  if (!Number.isFinite(fpsCap) || fpsCap <= 0) return 30;
  return Math.max(1, Math.floor(fpsCap));
}

/** Target frame interval for an fps cap; never below 1ms. */
export function computeFrameInterval(fpsCap: number): number {
  return Math.max(MIN_SLEEP_MS, Math.floor(1000 / sanitizeFpsCap(fpsCap)));
}

/** Sleep remaining in the frame after `elapsedMs` of work; at least 1ms. */
export function computeSleepMs(frameIntervalMs: number, elapsedMs: number): number {
  const elapsed = Number.isFinite(elapsedMs) ? Math.max(0, elapsedMs) : 0;
  return Math.max(MIN_SLEEP_MS, Math.floor(frameIntervalMs - elapsed));
}
