import fs from "node:fs";
import os from "node:os";
import path from "node:path";

/** Write `files` (relative path -> contents) under a fresh temp dir and return the dir. */
export function writeTempTree(files: Readonly<Record<string, string>>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "eegconf-"));

  for (const [relPath, contents] of Object.entries(files)) {
    const abs = path.join(dir, relPath);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, contents, "utf8");
  }

  return dir;
}

export function removeTempTree(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
