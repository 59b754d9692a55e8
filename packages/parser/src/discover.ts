/**
 * Data file discovery.
 *
 * Lists the exports in a directory without looking at their content: a file
 * qualifies when its extension matches exactly and its stem starts with the
 * configured prefix. Browsers save repeated downloads as `name.csv`,
 * `name(1).csv`, `name(2).csv`, ... so results come back in that order.
 */

import { readdirSync } from "node:fs";
import { extname, parse } from "node:path";
import { IOError } from "./errors.js";

export const DEFAULT_FILE_STEM = "data_ibex";
export const DEFAULT_FILE_EXT = "csv";

export interface DiscoverOptions {
  /** Prefix every file stem must start with */
  stem?: string;
  /** Extension without the leading dot */
  ext?: string;
}

const COPY_SUFFIX = /^(.*?)\((\d+)\)$/;

function splitCopyNumber(stem: string): [base: string, copy: number] {
  const match = COPY_SUFFIX.exec(stem);
  if (!match) {
    return [stem, 0];
  }
  return [match[1] ?? "", Number(match[2])];
}

/**
 * Orders `name.csv` before `name(1).csv` before `name(2).csv` before `name(10).csv`.
 */
export function compareSnapshotNames(a: string, b: string): number {
  const [baseA, copyA] = splitCopyNumber(parse(a).name);
  const [baseB, copyB] = splitCopyNumber(parse(b).name);
  if (baseA !== baseB) {
    return baseA < baseB ? -1 : 1;
  }
  if (copyA !== copyB) {
    return copyA - copyB;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function listEntries(dir: string) {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw IOError.fromCause(dir, "read the directory", error);
  }
}

/**
 * File names (not paths) of the exports found directly inside `dir`.
 *
 * @throws IOError if the directory cannot be listed
 */
export function discoverDataFiles(dir: string, options: DiscoverOptions = {}): string[] {
  const stem = options.stem ?? DEFAULT_FILE_STEM;
  const ext = options.ext ?? DEFAULT_FILE_EXT;

  return listEntries(dir)
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => {
      const extension = extname(name);
      // Files without an extension never match
      if (extension.length <= 1) {
        return false;
      }
      return extension.slice(1) === ext && parse(name).name.startsWith(stem);
    })
    .sort(compareSnapshotNames);
}
