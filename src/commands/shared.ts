import { loadConfig, type TonearmConfig } from "../lib/config";
import { setLogLevel } from "../lib/logger";
import { loadSession } from "../services/sessionStore";
import { createTidalClient, type TidalClient } from "../services/tidal/client";
import { Credentials } from "../services/tidal/credentials";

export function loadCommandConfig(): TonearmConfig {
  const config = loadConfig();
  setLogLevel(config.log.level);
  return config;
}

/** Client for the session saved by `tonearm auth login`. */
export function openClient(config: TonearmConfig = loadCommandConfig()): TidalClient {
  const session = loadSession(config.tidal.session_path);
  if (!session) {
    throw new Error("Not logged in. Run: tonearm auth login");
  }
  return createTidalClient(new Credentials(config.tidal.token, session), {
    baseUrl: config.tidal.api_url,
  });
}

export function parseCount(value: string): number {
  return Number.parseInt(value, 10);
}
