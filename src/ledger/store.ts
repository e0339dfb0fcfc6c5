import { z } from "zod";
import type { VaultDB } from "../vault/db.js";
import type { ContradictionType } from "../scoring/types.js";
import type { ContradictionEntry, ContradictionStatus, Resolution } from "./types.js";

interface ContradictionRow {
  id: string;
  created_at: number;
  old_memory_id: string;
  new_memory_id: string;
  drift_mean: number;
  confidence_delta: number;
  status: ContradictionStatus;
  contradiction_type: ContradictionType;
  affects_slots: string;
  summary: string;
  confirmation_count: number;
  confirmed_memory_id: string | null;
  volatility: number;
  deferred_at: number | null;
  resolution: Resolution | null;
  winner_memory_id: string | null;
  resolved_at: number | null;
  status_changed_at: number;
}

const slotsSchema = z.array(z.string());

export interface EntryPatch {
  status?: ContradictionStatus;
  confirmationCount?: number;
  confirmedMemoryId?: string;
  deferredAt?: number;
  resolution?: Resolution;
  winnerMemoryId?: string | null;
  resolvedAt?: number;
  statusChangedAt?: number;
}

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof EntryPatch, string]> = [
  ["status", "status"],
  ["confirmationCount", "confirmation_count"],
  ["confirmedMemoryId", "confirmed_memory_id"],
  ["deferredAt", "deferred_at"],
  ["resolution", "resolution"],
  ["winnerMemoryId", "winner_memory_id"],
  ["resolvedAt", "resolved_at"],
  ["statusChangedAt", "status_changed_at"],
];

/** Sorted, de-duplicated slot list: the stored form and the signature form. */
export function normalizeSlots(slots: readonly string[] = []): string[] {
  return [...new Set(slots)].sort();
}

/**
 * Row-level access to the contradictions table.
 * Lifecycle rules live in ContradictionLedger; nothing here deletes.
 */
export class ContradictionStore {
  private readonly db;

  constructor(vaultDb: VaultDB) {
    this.db = vaultDb.raw();
  }

  insert(entry: ContradictionEntry): void {
    this.db
      .prepare(
        `INSERT INTO contradictions (
           id, created_at, old_memory_id, new_memory_id, drift_mean, confidence_delta, status,
           contradiction_type, affects_slots, summary, confirmation_count, confirmed_memory_id,
           volatility, deferred_at, resolution, winner_memory_id, resolved_at, status_changed_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.id,
        entry.timestamp,
        entry.oldMemoryId,
        entry.newMemoryId,
        entry.driftMean,
        entry.confidenceDelta,
        entry.status,
        entry.contradictionType,
        JSON.stringify(normalizeSlots(entry.affectsSlots)),
        entry.summary,
        entry.confirmationCount,
        entry.confirmedMemoryId,
        entry.volatility,
        entry.deferredAt,
        entry.resolution,
        entry.winnerMemoryId,
        entry.resolvedAt,
        entry.statusChangedAt,
      );
  }

  get(id: string): ContradictionEntry | null {
    const row = this.db
      .prepare("SELECT * FROM contradictions WHERE id = ?")
      .get(id) as ContradictionRow | undefined;
    return row ? this.toEntry(row) : null;
  }

  update(id: string, patch: EntryPatch): ContradictionEntry | null {
    const sets: string[] = [];
    const values: unknown[] = [];
    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      values.push(value);
    }
    if (sets.length > 0) {
      this.db.prepare(`UPDATE contradictions SET ${sets.join(", ")} WHERE id = ?`).run(...values, id);
    }
    return this.get(id);
  }

  listByStatus(statuses: readonly ContradictionStatus[]): ContradictionEntry[] {
    if (statuses.length === 0) return [];
    const placeholders = statuses.map(() => "?").join(", ");
    const rows = this.db
      .prepare(
        `SELECT * FROM contradictions WHERE status IN (${placeholders}) ORDER BY created_at ASC, rowid ASC`,
      )
      .all(...statuses) as ContradictionRow[];
    return rows.map((r) => this.toEntry(r));
  }

  listForMemory(memoryId: string): ContradictionEntry[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM contradictions WHERE old_memory_id = ? OR new_memory_id = ?
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(memoryId, memoryId) as ContradictionRow[];
    return rows.map((r) => this.toEntry(r));
  }

  /** Unresolved entries for exactly this (old, new) pair. */
  listUnresolvedForPair(oldMemoryId: string, newMemoryId: string): ContradictionEntry[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM contradictions
         WHERE old_memory_id = ? AND new_memory_id = ? AND status != 'resolved'
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(oldMemoryId, newMemoryId) as ContradictionRow[];
    return rows.map((r) => this.toEntry(r));
  }

  countBy(column: "status" | "contradiction_type", since: number): Array<{ key: string; count: number }> {
    return this.db
      .prepare(
        `SELECT ${column} AS key, COUNT(*) AS count FROM contradictions
         WHERE created_at >= ? GROUP BY ${column}`,
      )
      .all(since) as Array<{ key: string; count: number }>;
  }

  private toEntry(row: ContradictionRow): ContradictionEntry {
    return {
      id: row.id,
      timestamp: row.created_at,
      oldMemoryId: row.old_memory_id,
      newMemoryId: row.new_memory_id,
      driftMean: row.drift_mean,
      confidenceDelta: row.confidence_delta,
      status: row.status,
      contradictionType: row.contradiction_type,
      affectsSlots: slotsSchema.parse(JSON.parse(row.affects_slots)),
      summary: row.summary,
      confirmationCount: row.confirmation_count,
      confirmedMemoryId: row.confirmed_memory_id,
      volatility: row.volatility,
      deferredAt: row.deferred_at,
      resolution: row.resolution,
      winnerMemoryId: row.winner_memory_id,
      resolvedAt: row.resolved_at,
      statusChangedAt: row.status_changed_at,
    };
  }
}
