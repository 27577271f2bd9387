// setTimeout clamps anything above this to 1ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Format date to YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');

  return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

/**
 * `{prefix}{YYYYMMDD_HHMMSS}{suffix}`
 */
export function buildArtifactFilename(prefix: string, timestamp: Date, suffix: string): string {
  return `${prefix}${formatTimestamp(timestamp)}${suffix}`;
}

/**
 * Resolve once the wall clock reaches `target`, or as soon as `signal` aborts
 */
export function sleepUntil(target: Date, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => {
      if (timer) {
        clearTimeout(timer);
      }
      resolve();
    };

    const arm = () => {
      const remaining = target.getTime() - Date.now();
      if (remaining <= 0) {
        signal?.removeEventListener('abort', onAbort);
        resolve();
        return;
      }
      timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_DELAY_MS));
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    arm();
  });
}
