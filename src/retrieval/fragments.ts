/**
 * Fragment Repositories
 * Fragments are keyed by (sessionId, artifactId, index) and never mutated;
 * they are removed only together with their session.
 */

import path from "path";
import { z } from "zod";
import { ContextFragmentSchema, type ContextFragment } from "../schemas/session.js";
import { JsonFileStore } from "../store/file.js";

const FragmentsSchema = z.array(ContextFragmentSchema);

export function fragmentId(sessionId: string, artifactId: string, index: number): string {
  return `${sessionId}:${artifactId}:${index}`;
}

export interface FragmentRepository {
  has(id: string): Promise<boolean>;
  /** Inserts fragments whose id is not stored yet; returns how many were added */
  insert(fragments: readonly ContextFragment[]): Promise<number>;
  /** All fragments, or one session's */
  load(sessionId?: string): Promise<ContextFragment[]>;
  deleteSession(sessionId: string): Promise<number>;
}

export class MemoryFragmentRepository implements FragmentRepository {
  private readonly bySession = new Map<string, Map<string, ContextFragment>>();

  async has(id: string): Promise<boolean> {
    for (const fragments of this.bySession.values()) {
      if (fragments.has(id)) return true;
    }
    return false;
  }

  async insert(fragments: readonly ContextFragment[]): Promise<number> {
    let added = 0;
    for (const fragment of fragments) {
      const existing = this.bySession.get(fragment.sessionId) ?? new Map<string, ContextFragment>();
      if (!existing.has(fragment.id)) {
        existing.set(fragment.id, fragment);
        added++;
      }
      this.bySession.set(fragment.sessionId, existing);
    }
    return added;
  }

  async load(sessionId?: string): Promise<ContextFragment[]> {
    if (sessionId !== undefined) {
      return [...(this.bySession.get(sessionId)?.values() ?? [])];
    }
    return [...this.bySession.values()].flatMap((fragments) => [...fragments.values()]);
  }

  async deleteSession(sessionId: string): Promise<number> {
    const count = this.bySession.get(sessionId)?.size ?? 0;
    this.bySession.delete(sessionId);
    return count;
  }
}

/**
 * One JSON document per session under <dataDir>/fragments
 */
export class FileFragmentRepository implements FragmentRepository {
  private readonly files: JsonFileStore;

  constructor(dataDir: string) {
    this.files = new JsonFileStore({ basePath: path.join(dataDir, "fragments"), prettyPrint: false });
  }

  async has(id: string): Promise<boolean> {
    const sessionId = id.split(":")[0] ?? "";
    const fragments = await this.files.read(sessionId, FragmentsSchema);
    return (fragments ?? []).some((f) => f.id === id);
  }

  async insert(fragments: readonly ContextFragment[]): Promise<number> {
    const grouped = new Map<string, ContextFragment[]>();
    for (const fragment of fragments) {
      grouped.set(fragment.sessionId, [...(grouped.get(fragment.sessionId) ?? []), fragment]);
    }

    let added = 0;
    for (const [sessionId, incoming] of grouped) {
      const stored = (await this.files.read(sessionId, FragmentsSchema)) ?? [];
      const known = new Set(stored.map((f) => f.id));
      const fresh = incoming.filter((f) => !known.has(f.id));
      if (fresh.length > 0) {
        await this.files.write(sessionId, [...stored, ...fresh]);
        added += fresh.length;
      }
    }
    return added;
  }

  async load(sessionId?: string): Promise<ContextFragment[]> {
    const ids = sessionId !== undefined ? [sessionId] : await this.files.list();
    const all: ContextFragment[] = [];
    for (const id of ids) {
      all.push(...((await this.files.read(id, FragmentsSchema)) ?? []));
    }
    return all;
  }

  async deleteSession(sessionId: string): Promise<number> {
    const stored = (await this.files.read(sessionId, FragmentsSchema)) ?? [];
    await this.files.delete(sessionId);
    return stored.length;
  }
}
