import { stat } from "fs/promises";
import { relative, sep } from "path";

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Relative path with forward slashes, for messages and page paths */
export function toPosixRelative(from: string, to: string): string {
  return relative(from, to).split(sep).join("/");
}
