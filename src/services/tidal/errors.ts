import { z } from "zod";

/**
 * Every failure a request can end in. Callers narrow on `kind`:
 *
 * - `unauthorized`: 401, the session or token is no longer accepted
 * - `api`: structured 403/404 body from the service
 * - `status_code`: any other non-2xx status, or a 403/404 without a readable body
 * - `parse_json`: response body did not match the expected model
 * - `parse_etag`: the `etag` header was missing on a conditional read
 * - `request`: the exchange itself failed (DNS, TLS, connection reset)
 */
export type ClientError =
  | UnauthorizedError
  | ApiError
  | StatusCodeError
  | ParseJsonError
  | ParseEtagError
  | RequestError;

export type ClientErrorKind = ClientError["kind"];

export class UnauthorizedError extends Error {
  readonly kind = "unauthorized" as const;

  constructor() {
    super("request unauthorized");
    this.name = "UnauthorizedError";
  }
}

export class ApiError extends Error {
  readonly kind = "api" as const;

  constructor(
    readonly status: number,
    readonly apiMessage: string
  ) {
    super(`tidal error: ${status}: ${apiMessage}`);
    this.name = "ApiError";
  }
}

export class StatusCodeError extends Error {
  readonly kind = "status_code" as const;

  constructor(readonly status: number) {
    super(`status code: ${status}`);
    this.name = "StatusCodeError";
  }
}

export class ParseJsonError extends Error {
  readonly kind = "parse_json" as const;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`json parse error: ${detail}`, options);
    this.name = "ParseJsonError";
  }
}

export class ParseEtagError extends Error {
  readonly kind = "parse_etag" as const;

  constructor(url: string) {
    super(`etag header parse error: no etag returned for ${url}`);
    this.name = "ParseEtagError";
  }
}

export class RequestError extends Error {
  readonly kind = "request" as const;

  constructor(url: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`request error: ${detail} (${url})`, { cause });
    this.name = "RequestError";
  }
}

export function isClientError(value: unknown): value is ClientError {
  return (
    value instanceof UnauthorizedError ||
    value instanceof ApiError ||
    value instanceof StatusCodeError ||
    value instanceof ParseJsonError ||
    value instanceof ParseEtagError ||
    value instanceof RequestError
  );
}

// The service names the human-readable field either `message` or `userMessage`.
const apiErrorBodySchema = z
  .object({
    status: z.number().int(),
    message: z.string().optional(),
    userMessage: z.string().optional(),
  })
  .transform((body, ctx) => {
    const message = body.message ?? body.userMessage;
    if (message === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Expected message or userMessage",
      });
      return z.NEVER;
    }
    return { status: body.status, message };
  });

async function readApiError(response: Response): Promise<ApiError | null> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await response.text());
  } catch {
    return null;
  }
  const result = apiErrorBodySchema.safeParse(parsed);
  return result.success
    ? new ApiError(result.data.status, result.data.message)
    : null;
}

/**
 * Turn a non-2xx response into a client error. Only 403 and 404 carry a
 * structured body worth reading; any other body is discarded unread so the
 * connection is released.
 */
export async function classifyResponse(response: Response): Promise<ClientError> {
  switch (response.status) {
    case 401:
      await response.body?.cancel();
      return new UnauthorizedError();
    case 403:
    case 404:
      return (await readApiError(response)) ?? new StatusCodeError(response.status);
    default:
      await response.body?.cancel();
      return new StatusCodeError(response.status);
  }
}
