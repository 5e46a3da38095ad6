import { ArchitectureTag } from "../types";

const DOCKER_PLATFORMS: Record<ArchitectureTag, string> = {
  amd64: "linux/amd64",
  i386: "linux/386",
  aarch64: "linux/arm64",
  armv7: "linux/arm/v7",
  armhf: "linux/arm/v6"
};

const DOCKER_ARCH_ALIASES: Record<string, ArchitectureTag> = {
  amd64: "amd64",
  x64: "amd64",
  x86_64: "amd64",
  "386": "i386",
  i386: "i386",
  arm64: "aarch64",
  "arm64/v8": "aarch64",
  aarch64: "aarch64",
  "arm/v7": "armv7",
  "arm/v6": "armhf",
  arm: "armhf"
};

export function dockerPlatformForArch(arch: ArchitectureTag): string {
  return DOCKER_PLATFORMS[arch];
}

export function archFromDockerPlatform(platform: string): ArchitectureTag | undefined {
  const trimmed = platform.trim().toLowerCase();
  const [os, ...archParts] = trimmed.split("/");
  if (os !== "linux" || archParts.length === 0) {
    return undefined;
  }

  const arch = archParts.join("/");
  return Object.prototype.hasOwnProperty.call(DOCKER_ARCH_ALIASES, arch) ? DOCKER_ARCH_ALIASES[arch] : undefined;
}

export function supportedDockerPlatforms(resolver: { readonly supported: readonly ArchitectureTag[] }): string[] {
  return resolver.supported.map((arch) => dockerPlatformForArch(arch));
}
