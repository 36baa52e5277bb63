// ── File Sources ────────────────────────────────────────────────────
// The only place that touches the filesystem: a ledger file and a
// directory of `YYYY-MM-DD.md` daily notes.

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { parseLedger, type LedgerEntry } from "./ledger.js";
import { parseTimeBlocks, type TimeBlock } from "./timeblocks.js";

const NOTE_FILE = /^(\d{4}-\d{2}-\d{2})\.md$/;

export async function readLedgerFile(path: string): Promise<LedgerEntry[]> {
  const content = await readFile(path, "utf8");
  return parseLedger(content);
}

export interface DailyNotesRange {
  /** Earliest note date to read, inclusive */
  since?: string;
  /** Latest note date to read, inclusive */
  until?: string;
}

/** Time blocks from every daily note in range, oldest note first. */
export async function readDailyNotes(
  dir: string,
  range: DailyNotesRange = {},
): Promise<TimeBlock[]> {
  const names = await readdir(dir);

  const notes = names
    .map((name) => ({ name, date: NOTE_FILE.exec(name)?.[1] }))
    .filter((note): note is { name: string; date: string } => note.date !== undefined)
    .filter((note) => !range.since || note.date >= range.since)
    .filter((note) => !range.until || note.date <= range.until)
    .sort((a, b) => a.date.localeCompare(b.date));

  const blocks: TimeBlock[] = [];
  for (const note of notes) {
    const markdown = await readFile(join(dir, note.name), "utf8");
    blocks.push(...parseTimeBlocks(markdown, note.date));
  }
  return blocks;
}
