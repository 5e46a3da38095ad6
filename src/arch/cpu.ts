import { machine } from "node:os";
import type { Logger } from "pino";
import type { ArchitectureTag } from "../types";

export const CPU_ARCH_MAP: ReadonlyMap<string, ArchitectureTag> = new Map<string, ArchitectureTag>([
  ["armv7", "armv7"],
  ["armv6", "armhf"],
  ["armv8", "aarch64"],
  ["aarch64", "aarch64"],
  ["i686", "i386"],
  ["x86_64", "amd64"]
]);

export const FALLBACK_CPU_ARCH: ArchitectureTag = "amd64";

export function readRawCpu(): string {
  return machine();
}

/**
 * Maps a raw machine string such as `armv7l` or `x86_64` to an architecture tag.
 * Exact matches win over the substring rules; anything unrecognised falls back
 * to amd64 with a warning.
 */
export function detectCpuArch(raw: string, logger?: Logger): ArchitectureTag {
  const cpuArch = raw.toLowerCase();

  const mapped = CPU_ARCH_MAP.get(cpuArch);
  if (mapped) {
    return mapped;
  }

  if (cpuArch.includes("aarch64")) {
    return "aarch64";
  }
  if (cpuArch.includes("arm") && cpuArch.includes("v8")) {
    return "aarch64";
  }
  if (cpuArch.includes("arm") && cpuArch.includes("v7")) {
    return "armv7";
  }
  if (cpuArch.includes("arm")) {
    return "armhf";
  }

  logger?.warn({ cpu: cpuArch }, `unsupported CPU architecture: ${cpuArch}`);
  return FALLBACK_CPU_ARCH;
}
