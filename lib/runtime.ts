import path from "node:path";
import { createLogger } from "./logger";

const log = createLogger("runtime");

const DEFAULT_THRESHOLD_HOURS = 16;
const DEFAULT_TIMEZONE = "Europe/Amsterdam";
const LEDGER_FILENAME = "weekuren_cumulatief.csv";

export function getDataDir() {
  return process.env.WEEKUREN_DATA_DIR?.trim() || path.join(process.cwd(), "data");
}

export function getLedgerFilePath() {
  return path.join(getDataDir(), LEDGER_FILENAME);
}

export function getLayoutsFilePath() {
  return process.env.LAYOUTS_FILE?.trim() || path.join(process.cwd(), "config", "layouts.json");
}

export function getThresholdHours() {
  const raw = Number(process.env.STUDENT_THRESHOLD_HOURS?.trim() || DEFAULT_THRESHOLD_HOURS);
  return Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_THRESHOLD_HOURS;
}

export function isValidTimeZone(timeZone: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function getTimeZone() {
  const raw = process.env.WEEKUREN_TIMEZONE?.trim();
  if (!raw) return DEFAULT_TIMEZONE;
  if (isValidTimeZone(raw)) return raw;
  log.warn(`Unknown WEEKUREN_TIMEZONE "${raw}", using ${DEFAULT_TIMEZONE}`);
  return DEFAULT_TIMEZONE;
}

export function isPdfExportDisabled() {
  return process.env.DISABLE_PDF_EXPORT === "1";
}
