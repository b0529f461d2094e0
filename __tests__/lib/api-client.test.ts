// @vitest-environment jsdom
import { ApiRequestError, apiFetch, onCtfResult, setStoredToken } from "@/lib/api-client";

function respond(status: number, text: string) {
  const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(text, { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function failure(promise: Promise<unknown>): Promise<ApiRequestError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ApiRequestError) return err;
    throw err;
  }
  throw new Error("expected the request to fail");
}

describe("apiFetch", () => {
  afterEach(() => {
    setStoredToken(null);
    vi.unstubAllGlobals();
  });

  it("sends the stored token and a JSON content type", async () => {
    setStoredToken("test-token");
    const fetchMock = respond(200, '{"ok":true}');

    expect(await apiFetch("/api/comments", { method: "POST", body: "{}" })).toEqual({ ok: true });
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("Authorization")).toBe("Token test-token");
    expect(headers.get("Content-Type")).toBe("application/json");
  });

  it("resolves an empty 2xx body as null", async () => {
    respond(200, "");
    expect(await apiFetch("/api/notifications/mark-all-read")).toBeNull();
  });

  it("rejects a 2xx body that is not JSON", async () => {
    respond(200, "<html>gateway</html>");
    const err = await failure(apiFetch("/api/feed"));
    expect(err.message).toBe("Invalid JSON response");
    expect(err.status).toBe(200);
    expect(err.body).toBe("<html>gateway</html>");
  });

  it("uses the error envelope's message", async () => {
    respond(404, '{"error":"not_found","message":"Post not found."}');
    const err = await failure(apiFetch("/api/posts/9"));
    expect(err.message).toBe("Post not found.");
    expect(err.status).toBe(404);
  });

  it("falls back to the status for bodies that are not envelopes", async () => {
    respond(404, '{"error":"teapot","message":"short and stout"}');
    expect((await failure(apiFetch("/api/posts/9"))).message).toBe("Request failed (404)");
  });

  it("broadcasts CTF bodies to listeners", async () => {
    const seen: unknown[] = [];
    const stop = onCtfResult((result) => seen.push(result.flag));
    respond(200, '{"vulnerability_detected":true,"flag":"CTF{test_flag}"}');

    await apiFetch("/api/posts/1/image");
    stop();
    expect(seen).toEqual(["CTF{test_flag}"]);
  });
});
