import { describe, expect, it, vi } from "vitest";
import {
  createFakeFetch,
  jsonResponse,
  textResponse,
} from "../../test/mocks/tidal-api";
import { Credentials, createSession, hasSession } from "./credentials";

const LOGIN_URL = "https://tidal.test/login/username";

describe("Credentials", () => {
  it("starts without a session", () => {
    const credentials = new Credentials("test-token");
    expect(credentials.token).toBe("test-token");
    expect(credentials.session).toBeUndefined();
    expect(hasSession(credentials)).toBe(false);
  });

  it("withSession returns a new value and leaves the original untouched", () => {
    const credentials = new Credentials("test-token");
    const session = { userId: 1234, sessionId: "xq123", countryCode: "US" };
    const next = credentials.withSession(session);

    expect(hasSession(next)).toBe(true);
    expect(next.session).toEqual(session);
    expect(next.token).toBe("test-token");
    expect(credentials.session).toBeUndefined();
  });

  it("freezes the attached session", () => {
    const next = new Credentials("test-token", {
      userId: 1,
      sessionId: "s",
      countryCode: "DE",
    });
    expect(Object.isFrozen(next.session)).toBe(true);
  });
});

describe("createSession", () => {
  it("attaches the session returned by a successful login", async () => {
    const { fetchImpl } = createFakeFetch({
      "POST /login/username": () =>
        jsonResponse({
          userId: 123,
          sessionId: "session-id-123",
          countryCode: "US",
        }),
    });

    const result = await createSession(
      new Credentials("test-token"),
      "listener@example.com",
      "test-password",
      { loginUrl: LOGIN_URL, fetchImpl }
    );

    expect(result.session).toEqual({
      userId: 123,
      sessionId: "session-id-123",
      countryCode: "US",
    });
    expect(result.token).toBe("test-token");
  });

  it("sends the token as a query parameter and the login as a form body", async () => {
    const { fetchImpl, requests } = createFakeFetch({
      "POST /login/username": () =>
        jsonResponse({ userId: 1, sessionId: "s-1", countryCode: "NO" }),
    });

    await createSession(
      new Credentials("test-token"),
      "listener@example.com",
      "test-password",
      { loginUrl: LOGIN_URL, fetchImpl }
    );

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request?.method).toBe("POST");
    expect(request?.url.searchParams.get("token")).toBe("test-token");
    expect(request?.headers.get("content-type")).toBe(
      "application/x-www-form-urlencoded"
    );
    const form = new URLSearchParams(request?.body ?? "");
    expect(form.get("username")).toBe("listener@example.com");
    expect(form.get("password")).toBe("test-password");
  });

  it("leaves the session absent when the login is rejected", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const { fetchImpl } = createFakeFetch({
      "POST /login/username": () =>
        jsonResponse(
          { status: 401, subStatus: 3001, userMessage: "Invalid credentials" },
          { status: 401 }
        ),
    });
    const credentials = new Credentials("test-token");

    const result = await createSession(credentials, "listener", "wrong", {
      loginUrl: LOGIN_URL,
      fetchImpl,
    });

    expect(hasSession(result)).toBe(false);
    expect(result).toBe(credentials);
    expect(stderr).toHaveBeenCalledWith(
      "[error] Creating session for listener failed: login returned 401"
    );
  });

  it("leaves the session absent when the body is not a session", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { fetchImpl } = createFakeFetch({
      "POST /login/username": () => jsonResponse({ userId: "not-a-number" }),
    });

    const result = await createSession(
      new Credentials("test-token"),
      "listener",
      "test-password",
      { loginUrl: LOGIN_URL, fetchImpl }
    );

    expect(result.session).toBeUndefined();
  });

  it("leaves the session absent when the body is not JSON", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { fetchImpl } = createFakeFetch({
      "POST /login/username": () => textResponse("<html>maintenance</html>"),
    });

    const result = await createSession(
      new Credentials("test-token"),
      "listener",
      "test-password",
      { loginUrl: LOGIN_URL, fetchImpl }
    );

    expect(result.session).toBeUndefined();
  });

  it("leaves the session absent when the request cannot be made", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(
      new TypeError("fetch failed")
    );

    const result = await createSession(
      new Credentials("test-token"),
      "listener",
      "test-password",
      { loginUrl: LOGIN_URL, fetchImpl }
    );

    expect(result.session).toBeUndefined();
  });

  it("logs only the username and the failure", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const { fetchImpl } = createFakeFetch({
      "POST /login/username": () => textResponse("", 400),
    });

    await createSession(new Credentials("test-token"), "listener", "test-password", {
      loginUrl: LOGIN_URL,
      fetchImpl,
    });

    expect(stderr.mock.calls).toEqual([
      ["[error] Creating session for listener failed: login returned 400"],
    ]);
  });

  it("throws when no application token is set", async () => {
    await expect(
      createSession(new Credentials(""), "listener", "test-password")
    ).rejects.toThrow("Application token needs to be set before creating a session");
  });
});
