/**
 * Shared helpers for the test suites
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Writable } from "stream";

/**
 * Writable stream that keeps everything written to it
 */
export class MemoryStream extends Writable {
  private chunks: string[] = [];

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join("");
  }

  lines(): string[] {
    return this.text()
      .split("\n")
      .filter((line) => line.length > 0);
  }
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `treecopy-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Create files below `root`; keys are `/`-separated relative paths
 */
export function writeTree(root: string, files: Record<string, string>): void {
  fs.mkdirSync(root, { recursive: true });
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, ...relative.split("/"));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

/**
 * Read every file below `root` into a map keyed by `/`-separated relative path
 */
export function readTree(root: string): Record<string, string> {
  const files: Record<string, string> = {};
  const walk = (dir: string, prefix: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full, relative);
      } else {
        files[relative] = fs.readFileSync(full, "utf-8");
      }
    }
  };
  walk(root, "");
  return files;
}

/**
 * Relative paths of every directory below `root`, sorted
 */
export function listDirectories(root: string): string[] {
  const directories: string[] = [];
  const walk = (dir: string, prefix: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isDirectory()) {
        const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
        directories.push(relative);
        walk(path.join(dir, entry.name), relative);
      }
    }
  };
  walk(root, "");
  return directories.sort();
}
