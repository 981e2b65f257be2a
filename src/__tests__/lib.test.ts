import { afterEach, describe, expect, test } from "vitest";
import { RestSend, Session, templateEndpoint } from "../lib.js";
import { fakeResponse, queueFetch } from "./helpers.js";

// Whole path through the public API: session, RestSend, response handler.
describe("controller round trips", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  async function loggedIn(...responses: Response[]) {
    const fetchMock = queueFetch(
      fakeResponse(200, "OK", { token: "abc123" }, { "Set-Cookie": "AuthCookie=abc123; Path=/" }),
      ...responses,
    );
    const session = new Session({ ip4: "192.0.2.10", password: "test-secret" }, { env: {} });
    await session.login();
    return { fetchMock, session, restSend: new RestSend({ sender: session }) };
  }

  test("a nonexistent template is a successful query that found nothing", async () => {
    const { restSend, session } = await loggedIn(fakeResponse(404, "Not Found", ""));
    const { result } = await restSend.commit(templateEndpoint("No_Such_Template"));
    expect(result).toEqual({ found: false, success: true });
    expect(session.history[0]).toEqual({
      returnCode: 404,
      path: "/appcenter/cisco/ndfc/api/v1/configtemplate/rest/config/templates/No_Such_Template",
    });
  });

  test("a PUT answered 200 with an embedded ERROR did not change anything", async () => {
    const { restSend } = await loggedIn(fakeResponse(200, "OK", { ERROR: "invalid payload" }));
    const { result } = await restSend.commit({ verb: "PUT", path: "/api/v1/thing", payload: { a: 1 } });
    expect(result).toEqual({ success: false, changed: false });
  });

  test("an expired token is refreshed and the request resent", async () => {
    const { restSend, session, fetchMock } = await loggedIn(
      fakeResponse(401, "Unauthorized", {}),
      fakeResponse(200, "OK", { jwttoken: "def456" }),
      fakeResponse(200, "OK", { id: 1 }),
    );
    const { result } = await restSend.commit({ verb: "GET", path: "/api/v1/thing" });

    expect(result).toEqual({ found: true, success: true });
    expect(session.token).toBe("def456");
    expect(String(fetchMock.mock.calls[2][0])).toBe("https://192.0.2.10/refresh");
    const headers = fetchMock.mock.calls[3][1]?.headers as Record<string, string>;
    expect(headers.Authorization).toBe("def456");
    expect(session.history.map((h) => h.returnCode)).toEqual([200, 200, 401, 200]);
  });
});
