/**
 * igdb-client.test.ts — Provider token, manifest and download flow with a
 * mocked fetch.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { RetrievalError } from "../src/server/errors.js";
import { IgdbClient } from "../src/server/services/igdb-client.js";

const TOKEN_URL = "https://auth.example.test/oauth2/token";
const DUMPS_URL = "https://api.example.test/v4/dumps/";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function createClient(fetchImpl: typeof fetch): IgdbClient {
  return new IgdbClient({
    clientId: "test-client",
    clientSecret: "test-secret",
    tokenUrl: TOKEN_URL,
    dumpsUrl: DUMPS_URL,
    fetchImpl,
  });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

describe("IgdbClient", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs) {
      await rm(dir, { recursive: true, force: true });
    }
    dirs.length = 0;
  });

  it("exchanges client credentials for a token", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ access_token: "test-token", expires_in: 3600 }));
    const token = await createClient(fetchMock as typeof fetch).fetchAccessToken();

    expect(token).toBe("test-token");
    const [url, init] = fetchMock.mock.calls[0] as unknown as [URL, RequestInit];
    expect(url.toString()).toBe(
      `${TOKEN_URL}?client_id=test-client&client_secret=test-secret&grant_type=client_credentials`,
    );
    expect(init.method).toBe("POST");
  });

  it("throws a RetrievalError when the token endpoint refuses", async () => {
    const client = createClient(vi.fn(async () => jsonResponse({ message: "invalid client" }, 400)) as typeof fetch);
    await expect(client.fetchAccessToken()).rejects.toMatchObject({
      name: "RetrievalError",
      status: 400,
      message: "token request failed with HTTP 400",
    });
  });

  it("requests the dump manifest with bearer and client headers", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ s3_url: "https://files.example.test/games.csv?sig=1" }));
    const manifest = await createClient(fetchMock as typeof fetch).fetchDumpManifest("test-token", "games");

    expect(manifest.s3_url).toBe("https://files.example.test/games.csv?sig=1");
    const [url, init] = fetchMock.mock.calls[0] as unknown as [string, RequestInit];
    expect(url).toBe("https://api.example.test/v4/dumps/games");
    expect(init.headers).toEqual({ Authorization: "Bearer test-token", "Client-ID": "test-client" });
  });

  it("rejects a manifest without a download URL", async () => {
    const client = createClient(vi.fn(async () => jsonResponse({ file_name: "games.csv" })) as typeof fetch);
    await expect(client.fetchDumpManifest("test-token", "games")).rejects.toBeInstanceOf(RetrievalError);
  });

  it("downloads every dump and reports per-entity failures", async () => {
    const dir = await mkdtemp(join(tmpdir(), "dumpsync-fetch-"));
    dirs.push(dir);

    const fetchMock = vi.fn(async (input: string | URL | Request) => {
      const url = urlOf(input);
      if (url.startsWith(TOKEN_URL)) return jsonResponse({ access_token: "test-token" });
      if (url.endsWith("/dumps/games")) return jsonResponse({ s3_url: "https://files.example.test/games.csv" });
      if (url.endsWith("/dumps/covers")) return jsonResponse({ message: "not found" }, 404);
      if (url === "https://files.example.test/games.csv") return new Response("id,name\n1,Alpha\n");
      throw new Error(`unexpected url ${url}`);
    });

    const result = await createClient(fetchMock as typeof fetch).fetchDumps(["games", "covers"], dir);

    expect(result.downloaded).toEqual([{ entity: "games", path: join(dir, "games.csv"), bytes: 16 }]);
    expect(result.failed).toEqual([{ entity: "covers", reason: "dump manifest for covers failed with HTTP 404" }]);
    expect(await readFile(join(dir, "games.csv"), "utf-8")).toBe("id,name\n1,Alpha\n");
  });

  it("fails the whole fetch when no token can be obtained", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 500));
    await expect(createClient(fetchMock as typeof fetch).fetchDumps(["games"], "unused")).rejects.toBeInstanceOf(
      RetrievalError,
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
