import path from "node:path";
import { bundledArchTablePath } from "./paths";

export const MACHINE_ENV = "HOSTARCH_MACHINE";
export const ARCH_TABLE_ENV = "HOSTARCH_ARCH_TABLE";

export function readMachineType(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return readOptionalString(env, MACHINE_ENV);
}

export function readArchTablePath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = readOptionalString(env, ARCH_TABLE_ENV);
  if (configured === undefined) {
    return bundledArchTablePath();
  }
  return path.resolve(configured.trim());
}

function readOptionalString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return raw;
}
