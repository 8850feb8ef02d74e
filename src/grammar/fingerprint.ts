import { createHash } from "node:crypto";

/** Grammar fingerprint: sha256 of the grammar text, prefixed with the algorithm. */
export function fingerprintOf(content: string | Buffer): string {
  return "sha256:" + createHash("sha256").update(content).digest("hex");
}

/** First 12 hex digits, for human output. */
export function shortFingerprint(fingerprint: string): string {
  return fingerprint.replace(/^sha256:/, "").slice(0, 12);
}
