import fs from "node:fs";
import path from "node:path";

import { ConfigurationError, getErrorMessage } from "./errors.js";

export const RECURSIVE_MARKER = "...";

function statItem(p: string): fs.Stats {
  try {
    return fs.statSync(p);
  } catch (err) {
    throw new ConfigurationError(
      "MissingPath",
      `cannot read ${p}: ${getErrorMessage(err)}`,
      p,
    );
  }
}

function readDir(dir: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new ConfigurationError(
      "MissingPath",
      `cannot list ${dir}: ${getErrorMessage(err)}`,
      dir,
    );
  }
}

function pointsToDirectory(entry: fs.Dirent, full: string): boolean {
  if (!entry.isSymbolicLink()) return false;
  try {
    return fs.statSync(full).isDirectory();
  } catch {
    // dangling link: listed like any other file
    return false;
  }
}

// Direct children that are not directories, in listing order.
function listFiles(dir: string): string[] {
  const out: string[] = [];
  for (const entry of readDir(dir)) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) continue;
    if (pointsToDirectory(entry, full)) continue;
    out.push(full);
  }
  return out;
}

// Depth-first: a directory's files come before anything in its subdirectories.
function walkFiles(dir: string, out: string[]) {
  const entries = readDir(dir);
  const subdirs: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      subdirs.push(full);
      continue;
    }
    if (pointsToDirectory(entry, full)) continue;
    out.push(full);
  }
  for (const sub of subdirs) walkFiles(sub, out);
}

export function isRecursiveItem(item: string): boolean {
  return item.length > RECURSIVE_MARKER.length && item.endsWith(RECURSIVE_MARKER);
}

/**
 * Turns the command-line items into a flat list of file paths.
 *
 * Plain files are kept as given. A directory contributes its direct files;
 * a directory written as `dir...` contributes every file below it.
 * Nothing is filtered by name or type: a file that is not an image simply
 * fails to load later.
 */
export function expandItems(items: readonly string[]): string[] {
  const out: string[] = [];
  for (const item of items) {
    const recursive = isRecursiveItem(item);
    const p = recursive ? item.slice(0, -RECURSIVE_MARKER.length) : item;
    const st = statItem(p);

    if (!st.isDirectory()) {
      out.push(p);
    } else if (recursive) {
      walkFiles(p, out);
    } else {
      out.push(...listFiles(p));
    }
  }
  return out;
}
