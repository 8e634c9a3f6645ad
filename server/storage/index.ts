import { isDatabaseAvailable } from "../db";
import { storageLogger } from "../logger";
import { AnalysesStorage } from "./domains/analyses.storage";
import { MemoryAnalysisStorage } from "./domains/memory.storage";
import type { IStorage } from "./interfaces";

export * from "./interfaces";
export { AnalysesStorage, MemoryAnalysisStorage };

export function createStorage(): IStorage {
  if (isDatabaseAvailable()) {
    return new AnalysesStorage();
  }
  storageLogger.warn("No database configured, analyses are kept in memory only");
  return new MemoryAnalysisStorage();
}
