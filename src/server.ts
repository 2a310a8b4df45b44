import { readFileSync } from "node:fs";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { GridSession } from "./grid";
import { parseRosterCsv } from "./roster";
import type { RosterEntry } from "./types";

function loadRosterFile(path: string | null): RosterEntry[] {
  if (!path) return [];
  const roster = parseRosterCsv(readFileSync(path, "utf8"));
  console.log(`Roster loaded: ${roster.length} records from ${path}`);
  return roster;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const session = new GridSession({
    rowCount: config.rowCount,
    roster: loadRosterFile(config.rosterPath),
  });

  const duplicates = session.rosterIndex.duplicates;
  if (duplicates.length > 0) {
    console.warn(
      `Roster has duplicate identifiers (first entry wins): ${duplicates.join(", ")}`
    );
  }

  const server = createApp(session);
  await new Promise<void>((resolve) => {
    server.listen(config.port, () => resolve());
  });
  console.log(
    `Server ready on http://localhost:${config.port} (${config.rowCount} rows)`
  );
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
