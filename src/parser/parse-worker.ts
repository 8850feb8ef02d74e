/**
 * Child-process entry for IsolatedParser. Holds one compiled grammar and
 * answers parse requests one at a time over the IPC channel.
 */
import { errorMessage } from "../errors.js";
import { grammarFromSource } from "../grammar/artifact.js";
import { OhmParser, type OhmLoadedParser } from "./ohm.js";
import { isWorkerRequest, type WorkerRequest, type WorkerResponse } from "./protocol.js";

let parser: OhmLoadedParser | null = null;

function reply(msg: WorkerResponse): void {
  if (!process.send) throw new Error("parse-worker must be started with an IPC channel");
  process.send(msg);
}

async function handle(msg: WorkerRequest): Promise<void> {
  if (msg.type === "load") {
    try {
      parser = await new OhmParser().load(grammarFromSource(msg.source, { path: msg.path, startRule: msg.startRule }));
      reply({ type: "loaded" });
    } catch (e) {
      reply({ type: "load_failed", message: errorMessage(e) });
    }
    return;
  }

  if (!parser) {
    reply({ type: "crashed", id: msg.id, message: "no grammar loaded" });
    return;
  }
  try {
    reply({ type: "result", id: msg.id, outcome: parser.parseSync(msg.text) });
  } catch (e) {
    reply({ type: "crashed", id: msg.id, message: errorMessage(e) });
  }
}

process.on("message", (msg: unknown) => {
  if (!isWorkerRequest(msg)) return;
  handle(msg).catch((e: unknown) => {
    process.stderr.write(`parse-worker: ${errorMessage(e)}\n`);
    process.exit(1);
  });
});

process.on("disconnect", () => process.exit(0));
