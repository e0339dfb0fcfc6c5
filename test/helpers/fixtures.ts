import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { parseConfig } from "../../src/config/schema.js";
import type { CredenceConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import { BeliefBus } from "../../src/events/bus.js";
import { VaultDB } from "../../src/vault/db.js";
import { MemoryStore } from "../../src/memory/store.js";
import { ContradictionLedger } from "../../src/ledger/ledger.js";
import type { Embedder } from "../../src/facts/types.js";
import type { Vector } from "../../src/scoring/types.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeConfig(raw: Record<string, unknown> = {}): CredenceConfig {
  return parseConfig({ logging: { level: "silent" }, ...raw });
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "credence-test-"));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export interface StoreHarness {
  dir: string;
  config: CredenceConfig;
  vault: VaultDB;
  bus: BeliefBus;
  memories: MemoryStore;
  ledger: ContradictionLedger;
  cleanup(): void;
}

/** Vault, memory store and ledger over a fresh temp directory. */
export function makeStores(config: CredenceConfig = makeConfig()): StoreHarness {
  const dir = makeTempDir();
  const vault = new VaultDB(dir);
  const bus = new BeliefBus();
  const logger = silentLogger();
  const memories = new MemoryStore(vault, config.scoring, bus, logger);
  const ledger = new ContradictionLedger(vault, memories, config.scoring, config.ledger, bus, logger);
  return {
    dir,
    config,
    vault,
    bus,
    memories,
    ledger,
    cleanup() {
      bus.dispose();
      vault.close();
      removeDir(dir);
    },
  };
}

/** Unit vector in the x/y plane at the given cosine to [1, 0, 0]. */
export function atCosine(cos: number): Vector {
  return [cos, Math.sqrt(1 - cos * cos), 0];
}

/** Embedder that returns fixed vectors per text, and a default for anything else. */
export class FakeEmbedder implements Embedder {
  private readonly vectors = new Map<string, Vector>();

  constructor(private readonly fallback: Vector = [0, 0, 1]) {}

  set(text: string, vector: Vector): this {
    this.vectors.set(text, vector);
    return this;
  }

  embed(text: string): Vector {
    return this.vectors.get(text) ?? this.fallback;
  }
}
