export interface FetchTextOptions {
  timeoutMs: number;
  userAgent: string;
}

// URLの本文をテキストで取得する。非2xxは例外
export async function fetchText(url: string, options: FetchTextOptions): Promise<string> {
  const response = await fetch(url, {
    headers: { 'User-Agent': options.userAgent },
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${response.statusText}`);
  }
  return response.text();
}
