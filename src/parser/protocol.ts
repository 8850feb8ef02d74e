import type { ParseOutcome } from "../types/parse.js";

/** Messages between IsolatedParser and a forked parse-worker. */
export type WorkerRequest =
  | { type: "load"; path: string; source: string; startRule: string | null }
  | { type: "parse"; id: number; text: string };

export type WorkerResponse =
  | { type: "loaded" }
  | { type: "load_failed"; message: string }
  | { type: "result"; id: number; outcome: ParseOutcome }
  | { type: "crashed"; id: number; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isWorkerRequest(value: unknown): value is WorkerRequest {
  if (!isRecord(value)) return false;
  if (value.type === "load") return typeof value.source === "string" && typeof value.path === "string";
  if (value.type === "parse") return typeof value.id === "number" && typeof value.text === "string";
  return false;
}

export function isWorkerResponse(value: unknown): value is WorkerResponse {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case "loaded":
      return true;
    case "load_failed":
      return typeof value.message === "string";
    case "result":
      return typeof value.id === "number" && isRecord(value.outcome);
    case "crashed":
      return typeof value.id === "number" && typeof value.message === "string";
    default:
      return false;
  }
}
