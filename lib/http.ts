import { NextResponse } from "next/server";
import { DecodeError, PersistenceError, UploadError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("api");

export function errorResponse(error: unknown, fallback: string) {
  if (error instanceof UploadError || error instanceof PersistenceError) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }
  log.error(fallback, error);
  return NextResponse.json({ error: fallback }, { status: 500 });
}

export async function readUploadFile(form: FormData) {
  const file = form.get("file");
  if (!(file instanceof File) || file.size === 0) {
    throw new DecodeError("No file uploaded.");
  }
  return {
    filename: file.name || "upload.csv",
    bytes: new Uint8Array(await file.arrayBuffer())
  };
}

export function formText(form: FormData, key: string): string | undefined {
  const value = form.get(key);
  return typeof value === "string" && value.trim() ? value : undefined;
}
