import fs from "fs";
import os from "os";
import path from "path";

const FIXTURES_DIR = path.resolve(__dirname, "..", "fixtures");

export const REPO_ROOT = path.resolve(__dirname, "..", "..");

export function loadFixture(source: string, filename: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, source, filename), "utf-8");
}

/** Fresh empty directory under the OS temp dir. */
export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
