export { ArchitectureResolver } from "./arch/resolver";
export { CPU_ARCH_MAP, FALLBACK_CPU_ARCH, detectCpuArch, readRawCpu } from "./arch/cpu";
export { loadCompatibilityTable, parseCompatibilityTable } from "./arch/table";
export { createLogger } from "./logging/logger";
export { ARCH_TABLE_ENV, MACHINE_ENV, readArchTablePath, readMachineType } from "./util/env";
export { ArchNotFoundError, ConfigFileError, HostArchError, ResolverNotLoadedError } from "./util/errors";
export { archFromDockerPlatform, dockerPlatformForArch, supportedDockerPlatforms } from "./util/platform";
export { bundledArchTablePath } from "./util/paths";
export { ARCHITECTURE_TAGS } from "./types";
export type {
  ArchitectureTag,
  ArchResolverOptions,
  CompatibilityTable,
  LoadOutcome,
  ResolverSnapshot,
  SupervisorArchSource
} from "./types";
