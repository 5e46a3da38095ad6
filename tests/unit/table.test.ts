import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadCompatibilityTable, parseCompatibilityTable } from "../../src/arch/table";
import { ConfigFileError } from "../../src/util/errors";
import { bundledArchTablePath } from "../../src/util/paths";
import { captureLogger, LEVEL_WARN, messagesAt } from "../helpers/logCapture";

describe("parseCompatibilityTable", () => {
  test("keeps machine order and tag order", () => {
    const table = parseCompatibilityTable({
      raspberrypi4: ["armv7", "armhf"],
      "intel-nuc": ["amd64", "i386"]
    });

    expect([...table.keys()]).toEqual(["raspberrypi4", "intel-nuc"]);
    expect(table.get("raspberrypi4")).toEqual(["armv7", "armhf"]);
    expect(table.get("intel-nuc")).toEqual(["amd64", "i386"]);
  });

  test("accepts an empty table", () => {
    expect(parseCompatibilityTable({}).size).toBe(0);
  });

  test("rejects non-object documents", () => {
    expect(() => parseCompatibilityTable(["amd64"])).toThrow(ConfigFileError);
    expect(() => parseCompatibilityTable("amd64")).toThrow(ConfigFileError);
    expect(() => parseCompatibilityTable(null)).toThrow(ConfigFileError);
  });

  test("rejects entries that are not lists of strings", () => {
    expect(() => parseCompatibilityTable({ board: "amd64" })).toThrow(ConfigFileError);
    expect(() => parseCompatibilityTable({ board: [64] })).toThrow(ConfigFileError);
  });

  test("drops empty entries and entries with unknown tags but keeps the rest", () => {
    const { logger, entries } = captureLogger();
    const table = parseCompatibilityTable(
      {
        raspberrypi4: ["armv7", "armhf"],
        "future-board": ["riscv64"],
        "mixed-board": ["amd64", "sparc"],
        "empty-board": []
      },
      "/etc/arch.json",
      logger
    );

    expect([...table.keys()]).toEqual(["raspberrypi4"]);
    expect(table.get("raspberrypi4")).toEqual(["armv7", "armhf"]);
    expect(messagesAt(entries, LEVEL_WARN)).toEqual([
      "dropping arch data for future-board: unknown architecture riscv64",
      "dropping arch data for mixed-board: unknown architecture sparc",
      "dropping arch data for empty-board: empty architecture list"
    ]);
  });

  test("names the source in the error", () => {
    expect(() => parseCompatibilityTable({ board: "amd64" }, "/etc/arch.json")).toThrow(
      /^can't read architecture table \/etc\/arch\.json: /
    );
    expect(() => parseCompatibilityTable({ board: "amd64" })).toThrow(/^can't read architecture table <inline>: /);
  });
});

describe("loadCompatibilityTable", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), "hostarch-table-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("reads a table file", async () => {
    const filePath = path.join(tempDir, "arch.json");
    await writeFile(filePath, JSON.stringify({ tinker: ["armv7", "armhf"] }), "utf8");

    const table = await loadCompatibilityTable(filePath);
    expect(table.get("tinker")).toEqual(["armv7", "armhf"]);
  });

  test("reports a missing file", async () => {
    const filePath = path.join(tempDir, "missing.json");

    await expect(loadCompatibilityTable(filePath)).rejects.toThrow(
      `can't read architecture table ${filePath}: file not found`
    );
  });

  test("reports invalid JSON", async () => {
    const filePath = path.join(tempDir, "arch.json");
    await writeFile(filePath, "{ not json", "utf8");

    const error = await loadCompatibilityTable(filePath).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConfigFileError);
    expect(error).toMatchObject({ filePath });
    expect(String(error)).toMatch(/invalid JSON/);
  });

  test("bundled table parses and covers common boards", async () => {
    const table = await loadCompatibilityTable(bundledArchTablePath());

    expect(table.size).toBe(16);
    expect(table.get("raspberrypi4")).toEqual(["armv7", "armhf"]);
    expect(table.get("raspberrypi4-64")).toEqual(["aarch64", "armv7", "armhf"]);
    expect(table.get("qemux86-64")).toEqual(["amd64", "i386"]);
  });
});
