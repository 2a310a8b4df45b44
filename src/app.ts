import express from "express";
import type { NextFunction, Request, Response } from "express";
import { GridSession } from "./grid";
import { normalizeRosterRecords } from "./roster";

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP surface over one grid session.
 *
 * Caller mistakes (bad index, unknown or derived field, malformed body) answer
 * 400 with `{ error }`.
 */
export function createApp(session: GridSession): express.Express {
  const app = express();
  app.use(express.json());

  // GET /rows -> full grid, empty rows included
  app.get("/rows", (_req, res) => {
    res.json({ data: session.rows });
  });

  // PATCH /rows/:index -> commit one cell edit
  app.patch("/rows/:index", (req, res) => {
    const index = Number.parseInt(req.params.index, 10);
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.field !== "string") {
      return res.status(400).json({ error: "Body must be { field, value }." });
    }

    const value = body.value ?? "";
    if (typeof value !== "string" && typeof value !== "number") {
      return res.status(400).json({ error: "value must be a string." });
    }

    try {
      const row = session.editCell(index, body.field, String(value));
      return res.json(row);
    } catch (err) {
      return res.status(400).json({ error: errorMessage(err, "Edit rejected") });
    }
  });

  // POST /rows/clear -> recreate the empty pool
  app.post("/rows/clear", (_req, res) => {
    session.clear();
    res.json({ data: session.rows });
  });

  // PUT /roster -> replace the roster wholesale
  app.put("/roster", (req, res) => {
    const body: unknown = req.body;
    if (!Array.isArray(body) || !body.every(isRecord)) {
      return res
        .status(400)
        .json({ error: "Body must be an array of roster records." });
    }

    const index = session.loadRoster(normalizeRosterRecords(body));
    if (index.duplicates.length > 0) {
      console.warn(
        `Roster has duplicate identifiers (first entry wins): ${index.duplicates.join(", ")}`
      );
    }
    return res.json({ entries: index.size, duplicates: index.duplicates });
  });

  // GET /summary -> attentions per patient and quarter
  app.get("/summary", (_req, res) => {
    res.json(session.summary());
  });

  // GET /export -> committed rows with category colors
  app.get("/export", (_req, res) => {
    res.json({ data: session.exportRows() });
  });

  app.use(
    (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      // body-parser marks malformed JSON with a 4xx status
      const status =
        isRecord(err) && typeof err.status === "number" && err.status < 500
          ? err.status
          : 500;
      if (status === 500) console.error("Unhandled request error:", err);
      res
        .status(status)
        .json({ error: errorMessage(err, "Internal server error") });
    }
  );

  return app;
}
