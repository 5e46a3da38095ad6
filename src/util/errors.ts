export class HostArchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HostArchError";
  }
}

export class ConfigFileError extends HostArchError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`can't read architecture table ${filePath}: ${reason}`);
    this.name = "ConfigFileError";
    this.filePath = filePath;
  }
}

export class ArchNotFoundError extends HostArchError {
  readonly candidates: string[];

  constructor(candidates: readonly string[]) {
    super(`no supported architecture among: ${candidates.length > 0 ? candidates.join(",") : "(none)"}`);
    this.name = "ArchNotFoundError";
    this.candidates = [...candidates];
  }
}

export class ResolverNotLoadedError extends HostArchError {
  constructor() {
    super("architecture resolver is not loaded");
    this.name = "ResolverNotLoadedError";
  }
}
