import type { Measured } from './types.js';

export const PRIORITY_RANK: Record<string, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1
};

export function shouldFail(failOn: string, priority: string): boolean {
  if (failOn === 'none') return false;
  const threshold = PRIORITY_RANK[failOn];
  const rank = PRIORITY_RANK[priority];
  if (threshold === undefined || rank === undefined) return false;
  return rank >= threshold;
}

export function present<T>(value: T): Measured<T> {
  return { kind: 'present', value };
}

export function absent<T>(): Measured<T> {
  return { kind: 'absent' };
}

export function valueOr<T>(measured: Measured<T>, fallback: T): T {
  return measured.kind === 'present' ? measured.value : fallback;
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

/** Percentile with linear interpolation between the closest ranks. */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = ((sorted.length - 1) * clamp(p, 0, 100)) / 100;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return low + (high - low) * (pos - lo);
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface PackageUrl {
  type: string;
  namespace?: string;
  name: string;
  version?: string;
}

export function parsePackageUrl(purl: string): PackageUrl | null {
  if (!purl.startsWith('pkg:')) return null;
  const withoutSubpath = purl.slice('pkg:'.length).split('#')[0] ?? '';
  const body = (withoutSubpath.split('?')[0] ?? '').replace(/^\/+/, '');

  const typeEnd = body.indexOf('/');
  if (typeEnd <= 0) return null;
  const type = body.slice(0, typeEnd).toLowerCase();
  let rest = body.slice(typeEnd + 1);

  let version: string | undefined;
  const versionAt = rest.lastIndexOf('@');
  if (versionAt > 0) {
    version = decodeURIComponent(rest.slice(versionAt + 1));
    rest = rest.slice(0, versionAt);
  }

  const segments = rest.split('/').filter(Boolean).map((s) => decodeURIComponent(s));
  const name = segments.pop();
  if (!name) return null;
  const namespace = segments.length > 0 ? segments.join('/') : undefined;
  return { type, namespace, name, version: version || undefined };
}

export async function mapWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  const out = new Array<R>(items.length);
  let next = 0;
  const run = async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      out[index] = await worker(items[index]);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => run());
  await Promise.all(workers);
  return out;
}
