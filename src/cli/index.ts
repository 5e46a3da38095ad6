#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import type { Logger } from "pino";
import { detectCpuArch } from "../arch/cpu";
import { ArchitectureResolver } from "../arch/resolver";
import { loadCompatibilityTable } from "../arch/table";
import { createCliLogger } from "../logging/logger";
import { readArchTablePath } from "../util/env";
import { HostArchError } from "../util/errors";
import { supportedDockerPlatforms } from "../util/platform";

interface ResolverCliOptions {
  machine?: string;
  cpu?: string;
  table?: string;
  verbose?: boolean;
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  const program = new Command();

  program
    .name("hostarch")
    .description("Resolve the CPU architectures this host can run")
    .showHelpAfterError(true);

  withResolverOptions(
    program
      .command("info")
      .description("Show default, native and supported architectures")
      .option("--json", "Print as JSON", false)
  ).action(async (options: ResolverCliOptions & { json: boolean }) => {
    const resolver = await loadResolver(options);
    const snapshot = resolver.snapshot();

    if (options.json) {
      process.stdout.write(`${JSON.stringify(snapshot, null, 2)}\n`);
      return;
    }

    process.stdout.write(`default\t${snapshot.default}\n`);
    process.stdout.write(`native\t${snapshot.native}\n`);
    process.stdout.write(`supported\t${snapshot.supported.join(",")}\n`);
  });

  withResolverOptions(
    program
      .command("cpu")
      .description("Map a raw machine string (default: this host) to an architecture tag")
      .argument("[raw]", "Raw machine string, e.g. armv7l or x86_64")
  ).action(async (raw: string | undefined, options: ResolverCliOptions) => {
    const logger = createCliLogger(Boolean(options.verbose));
    const arch = raw === undefined ? buildResolver(options, logger).detectCpu() : detectCpuArch(raw, logger);
    process.stdout.write(`${arch}\n`);
  });

  withResolverOptions(
    program
      .command("supports")
      .description("Check whether any of the given architectures can run on this host")
      .argument("<arch...>", "Candidate architecture tags")
  ).action(async (archs: string[], options: ResolverCliOptions) => {
    const resolver = await loadResolver(options);
    process.stdout.write(`${resolver.isSupported(archs)}\n`);
  });

  withResolverOptions(
    program
      .command("match")
      .description("Pick the preferred architecture among the given candidates")
      .argument("<arch...>", "Candidate architecture tags")
  ).action(async (archs: string[], options: ResolverCliOptions) => {
    const resolver = await loadResolver(options);
    process.stdout.write(`${resolver.match(archs)}\n`);
  });

  withResolverOptions(
    program.command("platforms").description("List docker platforms for the supported architectures, best first")
  ).action(async (options: ResolverCliOptions) => {
    const resolver = await loadResolver(options);
    for (const platform of supportedDockerPlatforms(resolver)) {
      process.stdout.write(`${platform}\n`);
    }
  });

  program
    .command("table")
    .description("Show the architecture compatibility table")
    .option("--table <path>", "Path to arch table JSON")
    .option("--verbose", "Enable debug logging", false)
    .action(async (options: { table?: string; verbose: boolean }) => {
      const table = await loadCompatibilityTable(resolveTablePath(options.table), createCliLogger(options.verbose));
      for (const [machineType, archs] of table) {
        process.stdout.write(`${machineType}\t${archs.join(",")}\n`);
      }
    });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    return 1;
  }
}

function withResolverOptions(command: Command): Command {
  return command
    .option("--machine <type>", "Machine type (default: $HOSTARCH_MACHINE)")
    .option("--cpu <raw>", "Raw CPU string (default: os.machine())")
    .option("--table <path>", "Path to arch table JSON (default: $HOSTARCH_ARCH_TABLE or bundled table)")
    .option("--verbose", "Enable debug logging", false);
}

function buildResolver(options: ResolverCliOptions, logger: Logger): ArchitectureResolver {
  return new ArchitectureResolver({
    machine: options.machine,
    cpu: options.cpu,
    tablePath: resolveTablePath(options.table),
    logger
  });
}

async function loadResolver(options: ResolverCliOptions): Promise<ArchitectureResolver> {
  const resolver = buildResolver(options, createCliLogger(Boolean(options.verbose)));
  const outcome = await resolver.load();
  if (outcome.status === "unavailable") {
    throw new HostArchError(`architecture table unavailable: ${outcome.error.message}`);
  }
  return resolver;
}

function resolveTablePath(table: string | undefined): string {
  return table === undefined ? readArchTablePath() : path.resolve(table);
}

if (require.main === module) {
  runCli().then((code) => {
    process.exitCode = code;
  });
}
