import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";

// Sources run from src/wld/, the build from dist/src/wld/; data/ sits at the package root.
const CANDIDATES = ["../../data/", "../../../data/"];

export function resolveDataFile(name: string): string {
  for (const dir of CANDIDATES) {
    const p = fileURLToPath(new URL(dir + name, import.meta.url));
    if (existsSync(p)) return p;
  }
  throw new Error(`Bundled data file not found: ${name}`);
}
