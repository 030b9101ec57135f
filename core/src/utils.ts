/**
 * 可被 AbortSignal 打断的 sleep。被打断时返回 false，正常结束返回 true。
 * 不抛出异常：调用方在让出点检查返回值后自行退出。
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  if (ms <= 0) return Promise.resolve(true);

  return new Promise<boolean>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function timeNumberToString(sec: number): string {
  const h = pad(Math.floor(sec / 3600));
  const m = pad(Math.floor((sec % 3600) / 60));
  const s = pad(Math.floor(sec % 60));
  return `${h}:${m}:${s}`;
}

type Clock = () => number;

const systemClock: Clock = () => Date.now();

export { pad, sleep, systemClock, timeNumberToString };
export type { Clock };
