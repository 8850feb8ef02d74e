import type { Isolation } from "../types/config.js";
import type { ParsingCapability } from "./capability.js";
import { IsolatedParser } from "./isolated.js";
import { OhmParser } from "./ohm.js";

export type { LoadedParser, ParseOptions, ParsingCapability } from "./capability.js";

export function createParsingCapability(isolation: Isolation): ParsingCapability {
  switch (isolation) {
    case "process":
      return new IsolatedParser();
    case "inline":
      return new OhmParser();
  }
}
