import * as fs from 'fs';
import * as path from 'path';
import { normalizeExtension } from '@docpath/core';

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

async function walk(dir: string, supported: ReadonlySet<string>, out: string[]): Promise<void> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (isHidden(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, supported, out);
    } else if (entry.isFile() && supported.has(normalizeExtension(path.extname(entry.name)))) {
      out.push(fullPath);
    }
  }
}

/**
 * Expand the command-line inputs into a list of files. Directories are walked
 * recursively, skipping hidden entries and unsupported extensions; files named
 * explicitly are kept whatever their extension, so the extractor reports on them.
 */
export async function collectFiles(inputs: string[], supportedExtensions: string[]): Promise<string[]> {
  const supported = new Set(supportedExtensions.map(normalizeExtension));
  const files: string[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const stats = await fs.promises.stat(input);
    const found: string[] = [];
    if (stats.isDirectory()) {
      await walk(input, supported, found);
    } else {
      found.push(input);
    }
    for (const file of found) {
      const key = path.resolve(file);
      if (!seen.has(key)) {
        seen.add(key);
        files.push(file);
      }
    }
  }

  return files;
}
