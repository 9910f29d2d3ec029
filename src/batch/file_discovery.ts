/**
 * File discovery for the batch optimizer
 */

import fs from "node:fs";
import path from "node:path";

export interface FileDiscoveryOptions {
  sourceDir: string;
  excludeDirs?: string[];
  extension?: string;
  skipExtension?: string;
}

export const IR_FILE_EXTENSION = ".lir";

const DEFAULT_EXCLUDES = ["node_modules", "test", "tests", "__tests__"];

export function discoverIRFiles(options: FileDiscoveryOptions): string[] {
  const exclude = new Set(options.excludeDirs ?? DEFAULT_EXCLUDES);
  const extension = options.extension ?? IR_FILE_EXTENSION;
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
      if (!entry.isFile() || !entry.name.endsWith(extension)) continue;
      if (options.skipExtension && entry.name.endsWith(options.skipExtension)) {
        continue;
      }
      result.push(entryPath);
    }
  };

  walk(options.sourceDir);
  return result.sort();
}
