/**
 * Shared timeout helper for promises.
 */
export function withTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new Error('timeout')), ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}

export function delayMs(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}
