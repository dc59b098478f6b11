import { debug } from "../../lib/logger";
import { hasSession, type AuthenticatedCredentials, type Credentials } from "./credentials";
import { convertResult, type Schema } from "./decode";
import { Albums } from "./endpoints/albums";
import { Artists } from "./endpoints/artists";
import { Playlists } from "./endpoints/playlists";
import { Search } from "./endpoints/search";
import { Tracks } from "./endpoints/tracks";
import { classifyResponse, ParseEtagError, RequestError } from "./errors";
import { searchSchema, type TidalSearch } from "./models";

export const DEFAULT_BASE_URL = "https://api.tidalhifi.com/v1";
export const TIDAL_ORIGIN = "http://listen.tidal.com";
export const DEFAULT_SEARCH_LIMIT = 10;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";
export type QueryParams = Record<string, string>;
export type FormPayload = Record<string, string>;

export type CallOptions = {
  query?: QueryParams | undefined;
  form?: FormPayload | undefined;
  etag?: string | undefined;
};

export type TidalClientOptions = {
  baseUrl?: string | undefined;
  origin?: string | undefined;
  fetchImpl?: typeof fetch | undefined;
};

export class SessionRequiredError extends Error {
  constructor() {
    super("A session needs to be obtained before using the TIDAL client. Run: tonearm auth login");
    this.name = "SessionRequiredError";
  }
}

export function normalizeBaseUrl(input: string): string {
  return input.replace(/\/+$/, "");
}

async function readText(response: Response, url: URL): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    throw new RequestError(url.toString(), err);
  }
}

/**
 * Authenticated access to the v1 API. Every request carries the session id
 * header and the session's country code; non-2xx answers are rejected with a
 * classified client error. Instances hold no mutable state and can be shared by
 * concurrent callers.
 */
export class TidalClient {
  readonly credentials: AuthenticatedCredentials;
  private readonly baseUrl: string;
  private readonly origin: string;
  private readonly fetchImpl: typeof fetch;

  constructor(
    credentials: AuthenticatedCredentials,
    options: TidalClientOptions = {}
  ) {
    this.credentials = credentials;
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL);
    this.origin = options.origin ?? TIDAL_ORIGIN;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  userId(): number {
    return this.credentials.session.userId;
  }

  resolveUrl(path: string, query: QueryParams = {}): URL {
    const absolute = path.startsWith("http")
      ? path
      : `${this.baseUrl}${path.startsWith("/") ? "" : "/"}${path}`;
    const url = new URL(absolute);

    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    // Every endpoint requires it; the session's value is not overridable.
    url.searchParams.set("countryCode", this.credentials.session.countryCode);
    return url;
  }

  async call(
    method: HttpMethod,
    path: string,
    options: CallOptions = {}
  ): Promise<Response> {
    let url: URL;
    try {
      url = this.resolveUrl(path, options.query);
    } catch (err) {
      throw new RequestError(path, err);
    }

    const headers: Record<string, string> = {
      "X-Tidal-SessionId": this.credentials.session.sessionId,
      Origin: this.origin,
    };
    if (options.etag !== undefined) {
      headers["If-None-Match"] = options.etag;
    }

    const init: RequestInit = { method, headers };
    if (options.form !== undefined) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      init.body = new URLSearchParams(options.form).toString();
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (err) {
      throw new RequestError(url.toString(), err);
    }

    debug(`${method} ${url.origin}${url.pathname} -> ${response.status}`);
    if (response.ok) {
      return response;
    }
    throw await classifyResponse(response);
  }

  async get(path: string, query?: QueryParams): Promise<string> {
    const response = await this.call("GET", path, { query });
    return readText(response, this.resolveUrl(path, query));
  }

  async post(path: string, form: FormPayload, etag?: string): Promise<string> {
    const response = await this.call("POST", path, { form, etag });
    return readText(response, this.resolveUrl(path));
  }

  async put(path: string, form: FormPayload, etag: string): Promise<string> {
    const response = await this.call("PUT", path, { form, etag });
    return readText(response, this.resolveUrl(path));
  }

  /** Current version token of a resource, for use as `If-None-Match`. */
  async etag(path: string): Promise<string> {
    const response = await this.call("GET", path);
    const etag = response.headers.get("etag");
    await response.body?.cancel();
    if (etag === null) {
      throw new ParseEtagError(this.resolveUrl(path).toString());
    }
    return etag;
  }

  async search(term: string, limit = DEFAULT_SEARCH_LIMIT): Promise<TidalSearch> {
    const text = await this.get("/search", {
      query: term,
      limit: String(limit),
    });
    return this.convertResult(text, searchSchema);
  }

  convertResult<T>(text: string, schema: Schema<T>): T {
    return convertResult(text, schema);
  }

  artists(): Artists {
    return new Artists(this);
  }

  albums(): Albums {
    return new Albums(this);
  }

  playlists(): Playlists {
    return new Playlists(this);
  }

  tracks(): Tracks {
    return new Tracks(this);
  }

  searches(): Search {
    return new Search(this);
  }
}

/** Build a client from credentials that may still lack a session. */
export function createTidalClient(
  credentials: Credentials,
  options: TidalClientOptions = {}
): TidalClient {
  if (!hasSession(credentials)) {
    throw new SessionRequiredError();
  }
  return new TidalClient(credentials, options);
}
