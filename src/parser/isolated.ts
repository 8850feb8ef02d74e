import { fork, type ChildProcess } from "node:child_process";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { GrammarLoadError, ParseTimeoutError, RunCancelledError } from "../errors.js";
import type { GrammarArtifact } from "../grammar/artifact.js";
import type { ParseOutcome } from "../types/parse.js";
import type { LoadOptions, LoadedParser, ParseOptions, ParsingCapability } from "./capability.js";
import { compileOhmGrammar } from "./ohm.js";
import { isWorkerResponse, type WorkerRequest, type WorkerResponse } from "./protocol.js";

const here = fileURLToPath(import.meta.url);
// Same extension as this module, so a tsx-launched CLI forks the .ts entry with the inherited loader.
const WORKER_ENTRY = path.join(path.dirname(here), `parse-worker${path.extname(here)}`);

const STARTUP_TIMEOUT_MS = 15_000;

/**
 * One forked parse-worker. A parse that overruns its bound kills the child;
 * the next request starts a fresh one.
 */
class WorkerSlot {
  private child: ChildProcess | null = null;
  private nextId = 0;

  constructor(
    private readonly grammar: GrammarArtifact,
    private readonly entry: string,
  ) {}

  private request(child: ChildProcess, msg: WorkerRequest, timeoutMs: number, signal: AbortSignal | undefined, accept: (res: WorkerResponse) => boolean): Promise<WorkerResponse> {
    return new Promise<WorkerResponse>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        child.off("message", onMessage);
        child.off("exit", onExit);
        signal?.removeEventListener("abort", onAbort);
      };
      const fail = (err: Error): void => {
        cleanup();
        this.kill();
        reject(err);
      };
      const onMessage = (res: unknown): void => {
        if (!isWorkerResponse(res) || !accept(res)) return;
        cleanup();
        resolve(res);
      };
      const onExit = (code: number | null, sig: NodeJS.Signals | null): void => {
        cleanup();
        this.child = null;
        reject(new Error(`parse worker exited (code=${code ?? "null"} signal=${sig ?? "none"})`));
      };
      const onAbort = (): void => fail(new RunCancelledError());
      const timer = setTimeout(() => fail(new ParseTimeoutError(timeoutMs)), timeoutMs);

      child.on("message", onMessage);
      child.on("exit", onExit);
      signal?.addEventListener("abort", onAbort, { once: true });
      child.send(msg);
    });
  }

  private async ensureChild(signal: AbortSignal | undefined): Promise<ChildProcess> {
    if (this.child) return this.child;

    const child = fork(this.entry, [], { stdio: ["ignore", "ignore", "inherit", "ipc"] });
    this.child = child;
    const res = await this.request(
      child,
      { type: "load", path: this.grammar.path, source: this.grammar.source, startRule: this.grammar.startRule },
      STARTUP_TIMEOUT_MS,
      signal,
      (r) => r.type === "loaded" || r.type === "load_failed",
    );
    if (res.type === "load_failed") {
      this.kill();
      throw new GrammarLoadError(this.grammar.path, res.message);
    }
    return child;
  }

  async parse(text: string, opts: ParseOptions): Promise<ParseOutcome> {
    const child = await this.ensureChild(opts.signal);
    const id = this.nextId++;
    const res = await this.request(child, { type: "parse", id, text }, opts.timeoutMs, opts.signal, (r) => (r.type === "result" || r.type === "crashed") && r.id === id);
    if (res.type === "crashed") throw new Error(`parser crashed: ${res.message}`);
    if (res.type !== "result") throw new Error(`unexpected worker response: ${res.type}`);
    return res.outcome;
  }

  kill(): void {
    if (!this.child) return;
    this.child.kill("SIGKILL");
    this.child = null;
  }
}

class IsolatedLoadedParser implements LoadedParser {
  private readonly idle: WorkerSlot[];
  private readonly waiting: Array<(slot: WorkerSlot) => void> = [];
  private readonly all: WorkerSlot[];

  constructor(
    private readonly grammar: GrammarArtifact,
    slots: number,
    entry: string,
  ) {
    this.all = Array.from({ length: slots }, () => new WorkerSlot(grammar, entry));
    this.idle = [...this.all];
  }

  get fingerprint(): string {
    return this.grammar.fingerprint;
  }

  private acquire(): Promise<WorkerSlot> {
    const slot = this.idle.pop();
    if (slot) return Promise.resolve(slot);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(slot: WorkerSlot): void {
    const next = this.waiting.shift();
    if (next) next(slot);
    else this.idle.push(slot);
  }

  async parse(source: string, opts: ParseOptions): Promise<ParseOutcome> {
    const slot = await this.acquire();
    try {
      return await slot.parse(source, opts);
    } finally {
      this.release(slot);
    }
  }

  async dispose(): Promise<void> {
    for (const slot of this.all) slot.kill();
  }
}

/**
 * ohm-js in forked child processes: a hard wall-clock bound per parse, at
 * the cost of process start-up on first use and after every timeout.
 */
export class IsolatedParser implements ParsingCapability {
  readonly name = "ohm-process";

  constructor(private readonly entry: string = WORKER_ENTRY) {}

  async load(grammar: GrammarArtifact, opts: LoadOptions = {}): Promise<LoadedParser> {
    // Surface grammar errors before any process is started.
    compileOhmGrammar(grammar);
    return new IsolatedLoadedParser(grammar, Math.max(1, opts.concurrency ?? 1), this.entry);
  }
}
