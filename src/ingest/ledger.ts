// ── Ledger Parsing ──────────────────────────────────────────────────
// Plain-text ledger: blank-line separated transaction blocks, each a
// dated description line followed by one posting per line.
//
//   2024/06/03 Weekly groceries
//       Expenses:Food:Groceries     ₹1,250.00
//       Assets:Bank:Checking

export interface LedgerEntry {
  date: string; // "YYYY-MM-DD"
  description: string;
  amount: number;
  account: string;
  /** Account path padded to three levels: ["Expenses", "Food", "Groceries"] */
  levels: [string, string, string];
}

const HEADER = /^(\d{4})[/-](\d{2})[/-](\d{2})\s+(.+)$/;
// Account, optional currency symbol, amount with optional thousands
// separators, optional trailing "; comment"
const POSTING = /^([\p{L}\p{N}_:&-]+)\s+(?:[^\d\s.,;-]{1,3}\s*)?(-?[\d.,]*\d[\d.,]*)\s*(?:;.*)?$/u;

/**
 * Parse every posting that carries an amount. Postings without one (the
 * balancing leg) are skipped, as is any block mentioning "Starting Balances".
 */
export function parseLedger(content: string): LedgerEntry[] {
  const entries: LedgerEntry[] = [];
  const blocks = content.trim().split(/\r?\n\s*\r?\n/);

  for (const block of blocks) {
    const lines = block.split(/\r?\n/).map((line) => line.trim());
    if (lines.some((line) => line.includes("Starting Balances"))) continue;

    const header = HEADER.exec(lines[0] ?? "");
    if (!header) continue;
    const [, year, month, day, description] = header;
    const date = `${year}-${month}-${day}`;

    for (const line of lines.slice(1)) {
      const posting = POSTING.exec(line);
      if (!posting) continue;
      const [, account = "", rawAmount = ""] = posting;

      const amount = Number(rawAmount.replace(/,/g, ""));
      if (!Number.isFinite(amount)) continue;

      entries.push({
        date,
        description: (description ?? "").trim(),
        amount,
        account,
        levels: splitAccount(account),
      });
    }
  }

  return entries;
}

function splitAccount(account: string): [string, string, string] {
  const [first = "", second = "", ...rest] = account.split(":");
  return [first, second, rest.join(":")];
}
