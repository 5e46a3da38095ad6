import type { Logger } from "pino";
import { createLogger } from "../logging/logger";
import { ArchitectureTag, ArchResolverOptions, CompatibilityTable, LoadOutcome, ResolverSnapshot, SupervisorArchSource } from "../types";
import { readArchTablePath, readMachineType } from "../util/env";
import { ArchNotFoundError, ConfigFileError, HostArchError, ResolverNotLoadedError } from "../util/errors";
import { detectCpuArch, readRawCpu } from "./cpu";
import { loadCompatibilityTable } from "./table";

const AARCH64_SUPPORTED: readonly ArchitectureTag[] = ["aarch64", "armv7", "armhf"];

interface ResolvedArch {
  defaultArch: ArchitectureTag;
  supported: ArchitectureTag[];
}

/**
 * Works out which architecture tags this host can run.
 *
 * The resolver starts empty; `load()` reads the compatibility table and fills in
 * the default tag and the ordered supported list. A failed table read is logged
 * and leaves the resolver empty, so `isSupported` is false and `match` throws
 * until a later `load()` succeeds.
 */
export class ArchitectureResolver {
  private readonly machine: string | undefined;
  private readonly cpu: string;
  private readonly tablePath: string;
  private readonly supervisorSource: SupervisorArchSource | undefined;
  private readonly logger: Logger;

  private defaultArch: ArchitectureTag | undefined;
  private nativeArch: ArchitectureTag | undefined;
  private supportedArch: ArchitectureTag[] = [];
  private supportedSet: ReadonlySet<string> = new Set<string>();

  constructor(options: ArchResolverOptions = {}) {
    this.machine = normalizeMachine(options.machine ?? readMachineType());
    this.cpu = options.cpu ?? readRawCpu();
    this.tablePath = options.tablePath ?? readArchTablePath();
    this.supervisorSource = options.supervisor;
    this.logger = options.logger ?? createLogger();
  }

  get default(): ArchitectureTag {
    if (this.defaultArch === undefined) {
      throw new ResolverNotLoadedError();
    }
    return this.defaultArch;
  }

  get supervisor(): ArchitectureTag {
    if (!this.supervisorSource) {
      throw new HostArchError("no supervisor architecture source configured");
    }
    return this.supervisorSource.arch;
  }

  get supported(): readonly ArchitectureTag[] {
    return [...this.supportedArch];
  }

  get machineType(): string | undefined {
    return this.machine;
  }

  async load(): Promise<LoadOutcome> {
    let table: CompatibilityTable;
    try {
      table = await loadCompatibilityTable(this.tablePath, this.logger);
    } catch (error) {
      if (!(error instanceof ConfigFileError)) {
        throw error;
      }
      this.logger.warn({ path: this.tablePath, reason: error.message }, `can't read arch json file from ${this.tablePath}`);
      return { status: "unavailable", error };
    }

    const nativeSupport = this.detectCpu();
    this.logger.info({ native: nativeSupport }, `native architecture support: ${nativeSupport}`);

    const resolved = this.resolve(table, nativeSupport);
    this.nativeArch = nativeSupport;
    this.defaultArch = resolved.defaultArch;
    this.supportedArch = resolved.supported;
    this.supportedSet = new Set<string>(resolved.supported);

    this.logger.debug({ default: this.defaultArch, supported: this.supportedArch }, "architecture support resolved");
    return { status: "loaded" };
  }

  isSupported(archList: Iterable<string>): boolean {
    for (const arch of archList) {
      if (this.supportedSet.has(arch)) {
        return true;
      }
    }
    return false;
  }

  match(archList: Iterable<string>): ArchitectureTag {
    const candidates = new Set(archList);
    for (const arch of this.supportedArch) {
      if (candidates.has(arch)) {
        return arch;
      }
    }
    throw new ArchNotFoundError([...candidates]);
  }

  detectCpu(): ArchitectureTag {
    return detectCpuArch(this.cpu, this.logger);
  }

  snapshot(): ResolverSnapshot {
    if (this.defaultArch === undefined || this.nativeArch === undefined) {
      throw new ResolverNotLoadedError();
    }
    return {
      default: this.defaultArch,
      native: this.nativeArch,
      supported: [...this.supportedArch]
    };
  }

  // Order matters: each rule short-circuits the ones after it.
  private resolve(table: CompatibilityTable, nativeSupport: ArchitectureTag): ResolvedArch {
    if (this.machine === undefined) {
      this.logger.warn("can't detect the machine type");
      return { defaultArch: nativeSupport, supported: [nativeSupport] };
    }

    // 64-bit ARM hosts also run 32-bit ARM artifacts, whatever the table says.
    if (nativeSupport === "aarch64" || this.machine === "aarch64") {
      this.logger.info("setting up aarch64 architecture support");
      return { defaultArch: "aarch64", supported: [...AARCH64_SUPPORTED] };
    }

    let supported: ArchitectureTag[];
    const fromTable = table.get(this.machine);
    if (fromTable) {
      supported = [...fromTable];
    } else {
      this.logger.warn({ machine: this.machine }, `machine type ${this.machine} not found in arch data`);
      supported = [nativeSupport];
    }

    if (!supported.includes(nativeSupport)) {
      supported.push(nativeSupport);
    }

    return { defaultArch: supported[0], supported };
  }
}

function normalizeMachine(machine: string | undefined): string | undefined {
  return machine === undefined || machine === "" ? undefined : machine;
}
