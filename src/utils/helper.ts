import { lstat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await lstat(p);
    return true;
  } catch {
    return false;
  }
}
