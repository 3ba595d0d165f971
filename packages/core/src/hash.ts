import crypto from "node:crypto";

export function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/** Stable chunk id: the same path and ordinal always give the same id. */
export function chunkIdFor(sourcePath: string, ordinal: number): string {
  return sha256(`${sourcePath}:${ordinal}`);
}
