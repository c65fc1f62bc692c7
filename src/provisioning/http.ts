import type { HttpProbe } from './types';

export class FetchProbe implements HttpProbe {
  async fetchText(url: string, timeoutMs: number): Promise<string | null> {
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
      return await response.text();
    } catch {
      // Unreachable endpoints are the normal case while a load balancer warms up.
      return null;
    }
  }
}
