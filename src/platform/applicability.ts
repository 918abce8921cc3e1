import type { PlatformContext, PlatformFamily } from "../types/platform.js";

/**
 * Whitelist of platforms a rule runs on: whole families, plus named OSes
 * restricted to an inclusive version range.
 */
export interface Applicability {
  readonly families: readonly PlatformFamily[];
  readonly os?: Readonly<Record<string, { readonly from: string; readonly to: string }>>;
}

/** Compare dotted numeric versions; missing components count as 0. */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map((p) => Number.parseInt(p, 10) || 0);
  const pb = b.split(".").map((p) => Number.parseInt(p, 10) || 0);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function isApplicable(applicability: Applicability, platform: PlatformContext): boolean {
  if (applicability.families.includes(platform.family)) return true;
  const range = applicability.os?.[platform.name];
  if (!range) return false;
  return compareVersions(platform.version, range.from) >= 0 && compareVersions(platform.version, range.to) <= 0;
}
