/**
 * Raw line loading.
 */

import { readFileSync } from "node:fs";
import { IOError } from "./errors.js";

export interface RawFile {
  /** Path the text came from, or a label for in-memory input */
  source: string;
  lines: string[];
}

/**
 * Split text into lines. A final newline does not produce an empty last
 * line and a trailing carriage return is dropped from every line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split("\n");
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Read a whole export into memory.
 *
 * @throws IOError if the path is missing or unreadable
 */
export function readRawFile(path: string): RawFile {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw IOError.fromCause(path, "read lines from", error);
  }
  return { source: path, lines: splitLines(text) };
}
