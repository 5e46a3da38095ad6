import type { Logger } from "pino";
import type { ConfigFileError } from "./util/errors";

export const ARCHITECTURE_TAGS = ["armv7", "armhf", "aarch64", "i386", "amd64"] as const;

export type ArchitectureTag = (typeof ARCHITECTURE_TAGS)[number];

/** Machine type -> tags that machine can run, in preference order. */
export type CompatibilityTable = ReadonlyMap<string, readonly ArchitectureTag[]>;

export interface SupervisorArchSource {
  readonly arch: ArchitectureTag;
}

export interface ArchResolverOptions {
  machine?: string;
  cpu?: string;
  tablePath?: string;
  supervisor?: SupervisorArchSource;
  logger?: Logger;
}

export type LoadOutcome = { status: "loaded" } | { status: "unavailable"; error: ConfigFileError };

export interface ResolverSnapshot {
  default: ArchitectureTag;
  native: ArchitectureTag;
  supported: ArchitectureTag[];
}
