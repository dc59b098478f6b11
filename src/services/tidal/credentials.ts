import { z } from "zod";
import { debug, error } from "../../lib/logger";

export const DEFAULT_LOGIN_URL = "https://api.tidalhifi.com/v1/login/username";

// Login answer, e.g. { "userId": 173393989, "sessionId": "84df94d0-...", "countryCode": "DE" }
export const sessionSchema = z.object({
  userId: z.number().int(),
  sessionId: z.string().min(1),
  countryCode: z.string().min(1),
});

export type Session = Readonly<z.infer<typeof sessionSchema>>;

/**
 * Application token plus, once a login succeeded, the session the service
 * issued for it. Values are immutable; attaching a session returns a copy.
 */
export class Credentials {
  readonly token: string;
  readonly session: Session | undefined;

  constructor(token: string, session?: Session) {
    this.token = token;
    this.session = session ? Object.freeze({ ...session }) : undefined;
  }

  withSession(session: Session): Credentials {
    return new Credentials(this.token, session);
  }
}

export type AuthenticatedCredentials = Credentials & { readonly session: Session };

export function hasSession(
  credentials: Credentials
): credentials is AuthenticatedCredentials {
  return credentials.session !== undefined;
}

export type LoginOptions = {
  loginUrl?: string | undefined;
  fetchImpl?: typeof fetch | undefined;
};

async function requestSession(
  token: string,
  username: string,
  password: string,
  options: LoginOptions
): Promise<Session> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = new URL(options.loginUrl ?? DEFAULT_LOGIN_URL);
  url.searchParams.set("token", token);

  const response = await fetchImpl(url, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams({ username, password }).toString(),
  });
  debug(`POST ${url.origin}${url.pathname} -> ${response.status}`);

  if (!response.ok) {
    throw new Error(`login returned ${response.status}`);
  }

  const result = sessionSchema.safeParse(await response.json());
  if (!result.success) {
    throw new Error("login returned an unexpected body");
  }
  return result.data;
}

/**
 * Log in with a username and password. A failed login is not thrown: the
 * credentials come back without a session, and callers check `hasSession`.
 */
export async function createSession(
  credentials: Credentials,
  username: string,
  password: string,
  options: LoginOptions = {}
): Promise<Credentials> {
  if (credentials.token.length === 0) {
    throw new Error("Application token needs to be set before creating a session");
  }

  try {
    const session = await requestSession(
      credentials.token,
      username,
      password,
      options
    );
    return credentials.withSession(session);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    error(`Creating session for ${username} failed: ${message}`);
    return credentials;
  }
}
