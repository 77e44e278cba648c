import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

export const TEMPLATES = fileURLToPath(new URL("../templates", import.meta.url));

export const HELLO_WORLD = `---
title: Hello World
date: 2024-01-01
tags: [intro, test]
---
# Hi
`;

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "tagpress-"));
}

export function removeDir(dir: string) {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(root: string, files: Record<string, string>) {
  for (const [name, text] of Object.entries(files)) {
    const file = join(root, name);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, text);
  }
}
