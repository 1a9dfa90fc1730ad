/**
 * Scene file discovery for batch generation
 */

import fs from "node:fs";
import path from "node:path";

export interface FileDiscoveryOptions {
  /** A scene file, or a directory searched recursively. */
  source: string;
  excludeDirs?: string[];
}

const DEFAULT_EXCLUDES = ["node_modules", "dist", ".git"];

export function discoverSceneFiles(options: FileDiscoveryOptions): string[] {
  if (fs.statSync(options.source).isFile()) {
    return [options.source];
  }

  const exclude = new Set(options.excludeDirs ?? DEFAULT_EXCLUDES);
  const result: string[] = [];

  const walk = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (exclude.has(entry.name)) continue;
        walk(entryPath);
        continue;
      }
      if (entry.isFile() && entry.name.endsWith(".json")) {
        result.push(entryPath);
      }
    }
  };

  walk(options.source);
  return result.sort();
}
