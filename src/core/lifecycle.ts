import { join } from "node:path";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { CredenceConfig } from "../config/types.js";
import { componentLogger, createLogger, type Logger } from "../logging/logger.js";
import { BeliefBus } from "../events/bus.js";
import { VaultDB } from "../vault/db.js";
import { MemoryStore } from "../memory/store.js";
import { ContradictionLedger } from "../ledger/ledger.js";
import { AdmissionGate } from "../admission/gate.js";
import { DisclosureSessions } from "../disclosure/sessions.js";
import { loadCalibratedThresholds, withCalibration } from "../disclosure/calibration.js";
import { HashingEmbedder } from "../facts/embedder.js";
import { RegexFactExtractor } from "../facts/extractor.js";
import type { Embedder, FactExtractor } from "../facts/types.js";
import { BeliefEngine } from "./engine.js";

export const CALIBRATION_FILENAME = "calibrated_thresholds.json";

export interface OpenOptions {
  stateDir?: string;
  configPath?: string;
  /** Skips loading configPath. */
  config?: CredenceConfig;
  logger?: Logger;
  embedder?: Embedder;
  extractor?: FactExtractor;
}

export interface CredenceContext {
  config: CredenceConfig;
  logger: Logger;
  stateDir: string;
  vault: VaultDB;
  bus: BeliefBus;
  memories: MemoryStore;
  ledger: ContradictionLedger;
  gate: AdmissionGate;
  disclosure: DisclosureSessions;
  engine: BeliefEngine;
  close(): void;
}

/** Wires the stores, ledger, gate and engine over one state directory. */
export function openCredence(options: OpenOptions = {}): CredenceContext {
  // 1. Load config
  const config = options.config ?? loadConfig(options.configPath);

  // 2. Create logger
  const logger = options.logger ?? createLogger(config.logging);

  // 3. Ensure state directory
  const stateDir = ensureDir(options.stateDir ?? getStateDir());

  // 4. Calibrated disclosure thresholds, when a calibration run left some
  const calibrated = loadCalibratedThresholds(join(stateDir, CALIBRATION_FILENAME), logger);
  const disclosureConfig = calibrated ? withCalibration(config.disclosure, calibrated) : config.disclosure;

  // 5. Open vault and stores
  const vault = new VaultDB(stateDir);
  const bus = new BeliefBus();
  const memories = new MemoryStore(vault, config.scoring, bus, componentLogger(logger, "memory"));
  const ledger = new ContradictionLedger(
    vault,
    memories,
    config.scoring,
    config.ledger,
    bus,
    componentLogger(logger, "ledger"),
  );

  // 6. Admission and disclosure
  const gate = new AdmissionGate(ledger, config.scoring, config.ledger, componentLogger(logger, "admission"));
  const disclosure = new DisclosureSessions(disclosureConfig, bus, componentLogger(logger, "disclosure"));

  // 7. Engine
  const engine = new BeliefEngine({
    vault,
    memories,
    ledger,
    gate,
    disclosure,
    embedder: options.embedder ?? new HashingEmbedder(),
    extractor: options.extractor ?? new RegexFactExtractor(),
    config: { ...config, disclosure: disclosureConfig },
    logger: componentLogger(logger, "engine"),
  });

  logger.info({ stateDir, calibrated: calibrated !== null }, "Credence opened");

  return {
    config,
    logger,
    stateDir,
    vault,
    bus,
    memories,
    ledger,
    gate,
    disclosure,
    engine,
    close() {
      bus.dispose();
      vault.close();
      logger.info("Credence closed");
    },
  };
}
