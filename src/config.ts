import { DEFAULT_ROW_COUNT } from "./row";

export type RegistryConfig = {
  rowCount: number;
  rosterPath: string | null;
  port: number;
};

const MAX_ROW_COUNT = 500;

function parseIntOr(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) return fallback;
  const n = Number.parseInt(value.trim(), 10);
  return Number.isFinite(n) ? n : fallback;
}

/**
 * Reads configuration from environment variables.
 *
 * - `REGISTRO_ROW_COUNT`: grid size (default 30, clamped to 1..500)
 * - `REGISTRO_ROSTER_PATH`: roster CSV loaded at startup (optional)
 * - `PORT`: HTTP port (default 3000)
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): RegistryConfig {
  const rowCount = Math.min(
    Math.max(parseIntOr(env.REGISTRO_ROW_COUNT, DEFAULT_ROW_COUNT), 1),
    MAX_ROW_COUNT
  );
  const rosterPath = env.REGISTRO_ROSTER_PATH?.trim() || null;
  const port = parseIntOr(env.PORT, 3000);

  return { rowCount, rosterPath, port };
}
