export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label}: ${ms}ms以内に完了しませんでした`);
    this.name = 'TimeoutError';
  }
}

/**
 * Promise に制限時間を設ける。超過した場合は TimeoutError で reject する。
 * 元の処理自体はキャンセルされないため、HTTP は AbortSignal 側でも打ち切ること。
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
