import { Command } from "commander";
import type { TonearmConfig } from "../lib/config";
import { clearSession, loadSession, saveSession } from "../services/sessionStore";
import {
  createSession,
  Credentials,
  hasSession,
} from "../services/tidal/credentials";
import { loadCommandConfig } from "./shared";

type LoginOptions = {
  username: string;
  password?: string;
};

type AuthDeps = {
  config?: TonearmConfig;
  fetchImpl?: typeof fetch;
  env?: NodeJS.ProcessEnv;
};

export async function runLogin(
  options: LoginOptions,
  deps: AuthDeps = {}
): Promise<void> {
  const config = deps.config ?? loadCommandConfig();
  const env = deps.env ?? process.env;

  const password = options.password ?? env.TONEARM_PASSWORD;
  if (!password) {
    throw new Error("Missing password. Pass --password or set TONEARM_PASSWORD.");
  }
  if (config.tidal.token.length === 0) {
    throw new Error(
      "Missing application token. Set tidal.token in the config file or TONEARM_TOKEN."
    );
  }

  const credentials = await createSession(
    new Credentials(config.tidal.token),
    options.username,
    password,
    { loginUrl: config.tidal.login_url, fetchImpl: deps.fetchImpl }
  );
  if (!hasSession(credentials)) {
    throw new Error("Login failed. Check your username, password and token.");
  }

  saveSession(config.tidal.session_path, credentials.session);
  console.log(
    `Logged in as user ${credentials.session.userId} (${credentials.session.countryCode}).`
  );
}

export function runStatus(config: TonearmConfig = loadCommandConfig()): void {
  const session = loadSession(config.tidal.session_path);
  if (!session) {
    console.log("Not logged in.");
    return;
  }
  console.log(`Logged in as user ${session.userId} (${session.countryCode}).`);
}

export function runLogout(config: TonearmConfig = loadCommandConfig()): void {
  const removed = clearSession(config.tidal.session_path);
  console.log(removed ? "Logged out." : "No session to clear.");
}

export function registerAuthCommand(program: Command): void {
  const authCmd = program
    .command("auth")
    .description("Log in to TIDAL and manage the saved session");

  authCmd
    .command("login")
    .description("Create a session with a username and password")
    .requiredOption("--username <username>", "TIDAL username (email)")
    .option("--password <password>", "Password (or set TONEARM_PASSWORD)")
    .action(async (options: LoginOptions) => {
      await runLogin(options);
    });

  authCmd
    .command("status")
    .description("Show the saved session")
    .action(() => runStatus());

  authCmd
    .command("logout")
    .description("Forget the saved session")
    .action(() => runLogout());
}
