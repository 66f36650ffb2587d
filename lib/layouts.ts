import { readFile } from "node:fs/promises";
import { createLogger } from "./logger";
import { getLayoutsFilePath } from "./runtime";
import type { AggregationFlavor, LayoutDefinition, LayoutMode } from "./types";

const log = createLogger("layouts");

export const NAMED_LAYOUT: LayoutDefinition = {
  id: "kolommen",
  label: "Zelf kolommen kiezen",
  flavor: "instant",
  mode: { kind: "named" }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function sanitizeFlavor(value: unknown): AggregationFlavor {
  return value === "elapsed" ? "elapsed" : "instant";
}

function sanitizePair(value: unknown): [number, number] | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [inCol, outCol] = value;
  return isIndex(inCol) && isIndex(outCol) ? [inCol, outCol] : null;
}

export function sanitizeMode(value: unknown): LayoutMode | null {
  const source = asRecord(value);
  switch (source.kind) {
    case "named":
      return {
        kind: "named",
        start: typeof source.start === "string" ? source.start : undefined,
        end: typeof source.end === "string" ? source.end : undefined
      };
    case "block":
      return isIndex(source.startIndex) && isIndex(source.endIndex)
        ? { kind: "block", startIndex: source.startIndex, endIndex: source.endIndex }
        : null;
    case "fixed": {
      if (!Array.isArray(source.pairs)) return null;
      const pairs = source.pairs.map(sanitizePair);
      const valid = pairs.filter((pair): pair is [number, number] => pair !== null);
      return valid.length === pairs.length && valid.length > 0 ? { kind: "fixed", pairs: valid } : null;
    }
    case "header-match":
      return typeof source.inHeader === "string" && typeof source.outHeader === "string"
        ? { kind: "header-match", inHeader: source.inHeader, outHeader: source.outHeader }
        : null;
    default:
      return null;
  }
}

export function sanitizeLayout(value: unknown): LayoutDefinition | null {
  const source = asRecord(value);
  const id = typeof source.id === "string" ? source.id.trim() : "";
  const mode = sanitizeMode(source.mode);
  if (!id || !mode) return null;
  return {
    id,
    label: typeof source.label === "string" && source.label.trim() ? source.label.trim() : id,
    flavor: sanitizeFlavor(source.flavor),
    mode
  };
}

/** Configured layouts, always headed by the free column choice. */
export async function loadLayouts(filePath = getLayoutsFilePath()): Promise<LayoutDefinition[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    log.warn(`Layout file ${filePath} not loaded, only column choice available`, error);
    return [NAMED_LAYOUT];
  }

  const listed = asRecord(parsed).layouts;
  const entries: unknown[] = Array.isArray(listed) ? listed : [];
  const layouts: LayoutDefinition[] = [NAMED_LAYOUT];
  for (const entry of entries) {
    const layout = sanitizeLayout(entry);
    if (!layout) {
      log.warn("Skipping invalid layout entry", entry);
      continue;
    }
    if (layouts.some((existing) => existing.id === layout.id)) {
      log.warn(`Skipping duplicate layout id ${layout.id}`);
      continue;
    }
    layouts.push(layout);
  }
  return layouts;
}

export function findLayout(layouts: LayoutDefinition[], id: string | null | undefined) {
  const wanted = id?.trim() || NAMED_LAYOUT.id;
  return layouts.find((layout) => layout.id === wanted) ?? null;
}
