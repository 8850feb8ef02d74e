import fs from "node:fs/promises";
import { RegistryError, errorMessage } from "../errors.js";
import { schemaRegistry } from "../schema/registry.js";
import type { RegistryDocument, RegistrySnapshot, SyncReport, ValidationRecord } from "../types/registry.js";
import type { SampleResult, ValidationRun } from "../types/run.js";
import { atomicWriteJson } from "./atomic.js";
import { compareIds } from "./samples.js";

export const REGISTRY_SCHEMA_VERSION = "1.0.0";

export function freshRecord(sampleId: string): ValidationRecord {
  return {
    sample_id: sampleId,
    syntactic_status: "fail",
    structural_status: "not_run",
    last_error: null,
    grammar_fingerprint: null,
    updated_at: null,
  };
}

export function recordFromResult(result: SampleResult, fingerprint: string, at: string): ValidationRecord {
  return {
    sample_id: result.sample_id,
    syntactic_status: result.syntactic.status,
    structural_status: result.structural.status,
    last_error: result.syntactic.diagnostic ?? result.structural.diagnostic,
    grammar_fingerprint: fingerprint,
    updated_at: at,
  };
}

function cloneRecord(record: ValidationRecord): ValidationRecord {
  return {
    ...record,
    last_error: record.last_error ? { ...record.last_error, expected: record.last_error.expected ? [...record.last_error.expected] : null } : null,
  };
}

/**
 * Corpus registry — sample id → last known ValidationRecord, backed by one
 * JSON document. Read fresh by `open`; every write is a whole-document
 * atomic replace, and in-memory state only changes after the write lands.
 */
export class CorpusRegistry {
  private records: Map<string, ValidationRecord>;
  private synced = false;

  private constructor(
    readonly filePath: string,
    records: Map<string, ValidationRecord>,
    /** False until the document exists on disk. */
    private onDisk: boolean,
  ) {
    this.records = records;
  }

  get exists(): boolean {
    return this.onDisk;
  }

  /** Read the registry document; a missing file is an empty registry. */
  static async open(filePath: string): Promise<CorpusRegistry> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return new CorpusRegistry(filePath, new Map(), false);
      throw new RegistryError(`Cannot read registry ${filePath}: ${errorMessage(e)}`, { cause: e });
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (e) {
      throw new RegistryError(`Registry ${filePath} is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }

    const schemas = schemaRegistry();
    if (!schemas.conforms<RegistryDocument>("registry", doc)) {
      throw new RegistryError(`Registry ${filePath} is invalid: ${schemas.lastErrors("registry")}`);
    }
    for (const [id, record] of Object.entries(doc.records)) {
      if (record.sample_id !== id) {
        throw new RegistryError(`Registry ${filePath} is invalid: key "${id}" holds record for "${record.sample_id}"`);
      }
    }
    return new CorpusRegistry(filePath, new Map(Object.entries(doc.records)), true);
  }

  /**
   * Make the key set equal `sampleIds`: new ids get a fresh failing record,
   * ids no longer present are pruned. Idempotent. In memory only; call
   * persist() to write the result.
   */
  sync(sampleIds: Iterable<string>): SyncReport {
    const wanted = new Set(sampleIds);
    let inserted = 0;
    let removed = 0;

    for (const id of [...this.records.keys()]) {
      if (!wanted.has(id)) {
        this.records.delete(id);
        removed++;
      }
    }
    for (const id of wanted) {
      if (!this.records.has(id)) {
        this.records.set(id, freshRecord(id));
        inserted++;
      }
    }

    this.synced = true;
    return { inserted, removed, total: this.records.size };
  }

  private requireSynced(op: string): void {
    if (!this.synced) throw new RegistryError(`registry.${op}() called before sync()`);
  }

  ids(): string[] {
    this.requireSynced("ids");
    return [...this.records.keys()].sort(compareIds);
  }

  /** Deep copy; callers can never reach the live records. */
  snapshot(): RegistrySnapshot {
    this.requireSynced("snapshot");
    const out: RegistrySnapshot = {};
    for (const id of this.ids()) {
      const record = this.records.get(id);
      if (record) out[id] = cloneRecord(record);
    }
    return out;
  }

  private document(records: Map<string, ValidationRecord>): RegistryDocument {
    const out: RegistrySnapshot = {};
    for (const id of [...records.keys()].sort(compareIds)) {
      const record = records.get(id);
      if (record) out[id] = record;
    }
    return { schema_version: REGISTRY_SCHEMA_VERSION, updated_at: new Date().toISOString(), records: out };
  }

  async persist(): Promise<void> {
    this.requireSynced("persist");
    await atomicWriteJson(this.filePath, this.document(this.records));
    this.onDisk = true;
  }

  /**
   * Replace the record of every sample in the run, all or nothing. A result
   * for an id outside the synced set is refused before anything is written.
   */
  async commit(run: ValidationRun): Promise<void> {
    this.requireSynced("commit");

    const unknown = run.results.filter((r) => !this.records.has(r.sample_id)).map((r) => r.sample_id);
    if (unknown.length > 0) {
      throw new RegistryError(`run contains samples not in the registry: ${unknown.join(", ")}`);
    }

    const next = new Map(this.records);
    for (const result of run.results) {
      next.set(result.sample_id, recordFromResult(result, run.grammar_fingerprint, run.finished_at));
    }

    await atomicWriteJson(this.filePath, this.document(next));
    this.records = next;
    this.onDisk = true;
  }
}
