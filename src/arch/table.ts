import { readFile } from "node:fs/promises";
import Ajv2020, { type Schema } from "ajv/dist/2020";
import type { Logger } from "pino";
import { ARCHITECTURE_TAGS, ArchitectureTag, CompatibilityTable } from "../types";
import { ConfigFileError } from "../util/errors";

const ajv = new Ajv2020({ allErrors: true, strict: false });

const archTableSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: {
    type: "array",
    items: { type: "string" }
  }
} as const;

const validateArchTable = ajv.compile<Record<string, string[]>>(archTableSchema as Schema);
const KNOWN_TAGS: ReadonlySet<string> = new Set<string>(ARCHITECTURE_TAGS);

export async function loadCompatibilityTable(filePath: string, logger?: Logger): Promise<CompatibilityTable> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigFileError(filePath, describeReadError(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigFileError(filePath, `invalid JSON: ${(error as Error).message}`);
  }

  return parseCompatibilityTable(parsed, filePath, logger);
}

/**
 * Only the document shape is fatal. An entry that is empty or names an unknown
 * tag is dropped with a warning so the other machines stay usable.
 */
export function parseCompatibilityTable(raw: unknown, filePath = "<inline>", logger?: Logger): CompatibilityTable {
  if (!validateArchTable(raw)) {
    throw new ConfigFileError(filePath, ajv.errorsText(validateArchTable.errors));
  }

  const table = new Map<string, readonly ArchitectureTag[]>();
  for (const [machineType, entries] of Object.entries(raw)) {
    const reason = rejectEntryReason(entries);
    if (reason) {
      logger?.warn({ machine: machineType, path: filePath }, `dropping arch data for ${machineType}: ${reason}`);
      continue;
    }
    table.set(machineType, Object.freeze(entries.filter(isArchitectureTag)));
  }
  return table;
}

function rejectEntryReason(entries: string[]): string | undefined {
  if (entries.length === 0) {
    return "empty architecture list";
  }
  const unknown = entries.filter((entry) => !isArchitectureTag(entry));
  if (unknown.length > 0) {
    return `unknown architecture ${unknown.join(",")}`;
  }
  return undefined;
}

function isArchitectureTag(value: string): value is ArchitectureTag {
  return KNOWN_TAGS.has(value);
}

function describeReadError(error: unknown): string {
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return "file not found";
  }
  return error instanceof Error ? error.message : String(error);
}
