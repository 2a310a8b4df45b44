import { readFileSync, writeFileSync } from "node:fs";
import { categoryLabel } from "./classifier";
import { loadConfig } from "./config";
import { GridSession } from "./grid";
import { formatQuarter } from "./quarterly";
import { parseRosterCsv } from "./roster";

/**
 * Reads a flag value from argv.
 *
 * Supports both `--rows data.json` and `--rows=data.json`.
 * Returns `null` if the flag is not present or has no value.
 */
function getArgValue(flag: string): string | null {
  const idx = process.argv.findIndex(
    (a) => a === flag || a.startsWith(`${flag}=`)
  );
  if (idx === -1) return null;
  const a = process.argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = process.argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/**
 * CLI entrypoint.
 *
 * Pipeline:
 * 1) Load the roster CSV (`--roster` or `REGISTRO_ROSTER_PATH`).
 * 2) Replay the rows JSON (`--rows`) into a grid session.
 * 3) Print the quarterly attention summary.
 * 4) Write the export rows (`--out`, default `registro-export.json`).
 */
export async function runCli(): Promise<void> {
  const config = loadConfig();
  const rowsPath = getArgValue("--rows");
  const rosterPath = getArgValue("--roster") || config.rosterPath;
  const outPath = getArgValue("--out") || "registro-export.json";

  if (!rowsPath) {
    console.error("Missing rows file. Pass --rows <file.json>.");
    process.exit(1);
  }

  const session = new GridSession({ rowCount: config.rowCount });

  if (rosterPath) {
    const index = session.loadRoster(
      parseRosterCsv(readFileSync(rosterPath, "utf8"))
    );
    console.log(`Roster loaded: ${index.size} records from ${rosterPath}`);
    if (index.duplicates.length > 0) {
      console.warn(
        `Roster has duplicate identifiers (first entry wins): ${index.duplicates.join(", ")}`
      );
    }
  }

  const parsed: unknown = JSON.parse(readFileSync(rowsPath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`${rowsPath} must contain a JSON array of rows`);
  }

  const loaded = session.replay(parsed);
  if (parsed.length > session.rows.length) {
    console.warn(
      `Grid holds ${session.rows.length} rows; ignored ${parsed.length - session.rows.length} records.`
    );
  }
  console.log(`Loaded ${loaded} rows (${session.committedRows().length} with DNI).`);

  const summary = session.summary();
  if (summary.status === "no-data") {
    console.log("\nNo rows with DNI: nothing to summarize.");
  } else if (summary.status === "no-valid-dates") {
    console.log("\nNo valid attention dates found.");
  } else {
    console.log("\nDNI\tYear\tQuarter\tAttentions");
    for (const e of summary.entries) {
      console.log(`${e.identifier}\t${e.year}\t${formatQuarter(e.quarter)}\t${e.count}`);
    }
  }

  const exported = session.exportRows();
  const counts = new Map<string, number>();
  for (const r of exported) {
    const label = categoryLabel(r.category);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  writeFileSync(outPath, JSON.stringify(exported, null, 2), "utf8");
  console.log(`\nWrote ${outPath}`);
  for (const [label, n] of counts) console.log(`${label}: ${n}`);
}

runCli().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
