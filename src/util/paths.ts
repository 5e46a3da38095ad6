import path from "node:path";

export function packageRoot(): string {
  return path.resolve(__dirname, "..", "..");
}

export function bundledArchTablePath(): string {
  return path.join(packageRoot(), "data", "arch.json");
}
