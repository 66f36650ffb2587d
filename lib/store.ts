import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import { PersistenceError } from "./errors";
import { emptyLedger, ledgerFromTable, ledgerToTable } from "./ledger";
import { createLogger } from "./logger";
import { getLedgerFilePath } from "./runtime";
import type { Ledger } from "./types";

const log = createLogger("store");

export type LedgerStore = {
  filePath: string;
  read: () => Promise<Ledger>;
  write: (ledger: Ledger) => Promise<void>;
  remove: () => Promise<void>;
};

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function serializeLedger(ledger: Ledger): string {
  const [fields, ...data] = ledgerToTable(ledger);
  return Papa.unparse({ fields, data }, { newline: "\n" });
}

export function deserializeLedger(text: string): Ledger {
  const result = Papa.parse<string[]>(text, { skipEmptyLines: "greedy" });
  if (result.errors.some((error) => error.type === "Quotes")) {
    throw new Error("Ledger file has unbalanced quotes");
  }
  return ledgerFromTable(result.data);
}

export function createLedgerStore(filePath = getLedgerFilePath()): LedgerStore {
  const dir = path.dirname(filePath);

  async function read(): Promise<Ledger> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return emptyLedger();
      throw new PersistenceError(`Ledger file could not be read: ${filePath}`, { cause: error });
    }
    try {
      return deserializeLedger(raw);
    } catch (error) {
      throw new PersistenceError(`Ledger file is not a valid ledger: ${filePath}`, { cause: error });
    }
  }

  // Readers only ever see the old file or the complete new one.
  async function write(ledger: Ledger): Promise<void> {
    const tmpFile = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmpFile, serializeLedger(ledger), "utf8");
      await rename(tmpFile, filePath);
    } catch (error) {
      await rm(tmpFile, { force: true }).catch((cleanupError: unknown) => {
        log.warn(`Temporary ledger file not removed: ${tmpFile}`, cleanupError);
      });
      throw new PersistenceError(`Ledger file could not be written: ${filePath}`, { cause: error });
    }
  }

  async function remove(): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      throw new PersistenceError(`Ledger file could not be removed: ${filePath}`, { cause: error });
    }
  }

  return { filePath, read, write, remove };
}
