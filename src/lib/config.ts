import fs from "fs";
import yaml from "yaml";
import { z } from "zod";
import { DEFAULT_BASE_URL } from "../services/tidal/client";
import { DEFAULT_LOGIN_URL } from "../services/tidal/credentials";
import { isLogLevel, type LogLevel } from "./logger";
import { defaultConfigPath, defaultSessionPath, expandHome } from "./paths";

export type TonearmConfig = {
  tidal: {
    api_url: string;
    login_url: string;
    token: string;
    session_path: string;
  };
  log: {
    level: LogLevel;
  };
};

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const fileConfigSchema = z
  .object({
    tidal: z
      .object({
        api_url: z.string().url().optional(),
        login_url: z.string().url().optional(),
        token: z.string().optional(),
        session_path: z.string().min(1).optional(),
      })
      .optional(),
    log: z
      .object({
        level: logLevelSchema.optional(),
      })
      .optional(),
  })
  .nullable();

type FileConfig = z.infer<typeof fileConfigSchema>;

function defaultConfig(): TonearmConfig {
  return {
    tidal: {
      api_url: DEFAULT_BASE_URL,
      login_url: DEFAULT_LOGIN_URL,
      token: "",
      session_path: defaultSessionPath(),
    },
    log: {
      level: "info",
    },
  };
}

function readConfigFile(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) return null;

  const raw = fs.readFileSync(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid config file ${configPath}: ${message}`);
  }

  const result = fileConfigSchema.safeParse(parsed ?? null);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${configPath}: ${detail}`);
  }
  return result.data;
}

function envLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(
      `Invalid TONEARM_LOG_LEVEL "${value}". Use debug, info, warn, or error.`
    );
  }
  return normalized;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TonearmConfig {
  const configPath = expandHome(env.TONEARM_CONFIG_PATH ?? defaultConfigPath());
  const fileConfig = readConfigFile(configPath);
  const defaults = defaultConfig();

  const merged: TonearmConfig = {
    tidal: {
      api_url: fileConfig?.tidal?.api_url ?? defaults.tidal.api_url,
      login_url: fileConfig?.tidal?.login_url ?? defaults.tidal.login_url,
      token: fileConfig?.tidal?.token ?? defaults.tidal.token,
      session_path:
        fileConfig?.tidal?.session_path ?? defaults.tidal.session_path,
    },
    log: {
      level: fileConfig?.log?.level ?? defaults.log.level,
    },
  };

  return {
    tidal: {
      api_url: env.TONEARM_API_URL ?? merged.tidal.api_url,
      login_url: env.TONEARM_LOGIN_URL ?? merged.tidal.login_url,
      token: env.TONEARM_TOKEN ?? merged.tidal.token,
      session_path: expandHome(
        env.TONEARM_SESSION_PATH ?? merged.tidal.session_path
      ),
    },
    log: {
      level: envLogLevel(env.TONEARM_LOG_LEVEL) ?? merged.log.level,
    },
  };
}
