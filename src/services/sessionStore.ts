import fs from "fs";
import path from "path";
import { sessionSchema, type Session } from "./tidal/credentials";

/**
 * Persist the session issued at login so later CLI invocations can reuse it.
 * Stored as plain JSON, e.g. ~/.config/tonearm/session.json
 */
export function loadSession(sessionPath: string): Session | null {
  if (!fs.existsSync(sessionPath)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(sessionPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Corrupt session file ${sessionPath}: ${message}`);
  }

  const result = sessionSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Corrupt session file ${sessionPath}: expected userId, sessionId and countryCode`
    );
  }
  return result.data;
}

export function saveSession(sessionPath: string, session: Session): void {
  const dir = path.dirname(sessionPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(sessionPath, JSON.stringify(session, null, 2), {
    mode: 0o600,
  });
}

export function clearSession(sessionPath: string): boolean {
  if (!fs.existsSync(sessionPath)) return false;
  fs.unlinkSync(sessionPath);
  return true;
}
