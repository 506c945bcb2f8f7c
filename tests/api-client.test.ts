import { describe, it, expect, vi } from "vitest";
import { ApiError, apiRequest, buildUrl } from "../lib/api-client";
import { getApiBaseUrl } from "../lib/config";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("buildUrl", () => {
  it("prefixes relative paths with the API base URL", () => {
    expect(buildUrl("/api/children")).toBe("https://api.example.test/api/children");
    expect(buildUrl("api/children")).toBe("https://api.example.test/api/children");
  });

  it("encodes query parameters and drops undefined ones", () => {
    expect(buildUrl("/api/x", { a: "1 2", b: undefined, c: 3 })).toBe("https://api.example.test/api/x?a=1%202&c=3");
  });

  it("keeps absolute URLs and their existing query", () => {
    expect(buildUrl("https://other.example.test/p?x=1", { y: 2 })).toBe("https://other.example.test/p?x=1&y=2");
  });
});

describe("apiRequest", () => {
  it("sends the bearer token and unwraps data", async () => {
    const fetchMock = stubFetch(jsonResponse({ success: true, data: { children: [] } }));

    const result = await apiRequest<{ children: unknown[] }>("/api/children", { token: "test-token" });

    expect(result).toEqual({ children: [] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.example.test/api/children");
    const headers = new Headers(init?.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-token");
    expect(headers.get("Content-Type")).toBe("application/json");
  });

  it("throws the server error with its status", async () => {
    stubFetch(jsonResponse({ success: false, error: "Child not found" }, 404));

    const request = apiRequest("/api/children/missing");

    await expect(request).rejects.toBeInstanceOf(ApiError);
    await expect(request).rejects.toMatchObject({ message: "Child not found", status: 404 });
  });

  it("reports unreadable failures as a failed request", async () => {
    stubFetch(new Response("not json", { status: 500 }));

    await expect(apiRequest("/api/children")).rejects.toMatchObject({ message: "Request failed", status: 500 });
  });

  it("reports unreadable successes as an invalid payload", async () => {
    stubFetch(new Response("not json", { status: 200 }));

    await expect(apiRequest("/api/children")).rejects.toMatchObject({
      message: "Invalid response payload",
      status: 200,
    });
  });
});

describe("config", () => {
  it("fails loudly when the API base URL is missing", () => {
    vi.stubEnv("EXPO_PUBLIC_API_BASE_URL", "");
    expect(() => getApiBaseUrl()).toThrow("Missing EXPO_PUBLIC_API_BASE_URL");
  });
});
