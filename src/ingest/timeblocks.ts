// ── Time-Block Parsing ──────────────────────────────────────────────
// Completed checklist items in a daily note:
//
//   - [x] 09:00 - 10:30 Deep work on ledger import ✅ 2024-06-03

export interface TimeBlock {
  date: string; // note date, "YYYY-MM-DD"
  start: string; // "HH:MM"
  end: string; // "HH:MM"
  durationHours: number;
  activity: string;
}

const BLOCK = /^- \[x\] (\d{2}:\d{2}) - (\d{2}:\d{2})[:\s]*(.+?)(?:\s✅.*)?$/gmu;
const MINUTES_PER_DAY = 24 * 60;

/**
 * Extract completed time blocks from one note. A block ending before it
 * starts runs past midnight.
 */
export function parseTimeBlocks(markdown: string, date: string): TimeBlock[] {
  const blocks: TimeBlock[] = [];

  for (const match of markdown.matchAll(BLOCK)) {
    const [, start = "", end = "", activity = ""] = match;
    let minutes = toMinutes(end) - toMinutes(start);
    if (minutes < 0) minutes += MINUTES_PER_DAY;

    blocks.push({
      date,
      start,
      end,
      durationHours: minutes / 60,
      activity: activity.trim(),
    });
  }

  return blocks;
}

function toMinutes(hhmm: string): number {
  const [hours = 0, minutes = 0] = hhmm.split(":").map(Number);
  return hours * 60 + minutes;
}
