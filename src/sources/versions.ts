import type { Candidate } from "../types/paper";

/** "2501.01234v2" → { baseId: "2501.01234", version: 2 }. Unversioned ids count as version 0. */
export function splitVersion(id: string): { baseId: string; version: number } {
  const match = /^(.*?)v(\d+)$/i.exec(id);
  if (!match) return { baseId: id, version: 0 };
  return { baseId: match[1], version: Number(match[2]) };
}

export function baseIdOf(id: string): string {
  return splitVersion(id).baseId;
}

/**
 * Keep one candidate per base id: the highest version. The survivor takes the
 * position of the first occurrence of its base id.
 */
export function dedupeVersions(candidates: Candidate[]): Candidate[] {
  const slots = new Map<string, number>();
  const kept: Candidate[] = [];
  for (const c of candidates) {
    const { baseId, version } = splitVersion(c.id);
    const slot = slots.get(baseId);
    if (slot === undefined) {
      slots.set(baseId, kept.length);
      kept.push(c);
    } else if (version > splitVersion(kept[slot].id).version) {
      kept[slot] = c;
    }
  }
  return kept;
}
