/**
 * igdb-client.ts — Dump retrieval from the catalog provider
 *
 * 1. Exchange client credentials for a bearer token (POST token URL).
 * 2. Ask the dumps endpoint for each entity's signed download URL.
 * 3. Download the payload to `<dumpDir>/<entity>.csv`.
 *
 * Any non-2xx answer is a RetrievalError. `fetchDumps` logs per-entity
 * failures and carries on, so a later import works from whatever files
 * are already on disk.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { RetrievalError, errorMessage } from "../errors.js";
import { log } from "../logger.js";

export interface IgdbClientOptions {
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  dumpsUrl: string;
  fetchImpl?: typeof fetch;
}

export interface FetchDumpsResult {
  downloaded: Array<{ entity: string; path: string; bytes: number }>;
  failed: Array<{ entity: string; reason: string }>;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

const dumpManifestSchema = z.object({
  s3_url: z.string().url(),
  file_name: z.string().optional(),
  updated_at: z.number().optional(),
});

export type DumpManifest = z.infer<typeof dumpManifestSchema>;

async function readJson(res: Response, what: string): Promise<unknown> {
  try {
    return await res.json();
  } catch (err) {
    throw new RetrievalError(`${what} returned a non-JSON body: ${errorMessage(err)}`, { status: res.status, cause: err });
  }
}

export class IgdbClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: IgdbClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchAccessToken(): Promise<string> {
    const url = new URL(this.options.tokenUrl);
    url.searchParams.set("client_id", this.options.clientId);
    url.searchParams.set("client_secret", this.options.clientSecret);
    url.searchParams.set("grant_type", "client_credentials");

    const res = await this.fetchImpl(url, { method: "POST" });
    if (!res.ok) {
      throw new RetrievalError(`token request failed with HTTP ${res.status}`, { status: res.status });
    }

    const parsed = tokenResponseSchema.safeParse(await readJson(res, "token endpoint"));
    if (!parsed.success) {
      throw new RetrievalError("token response has no access_token", { status: res.status });
    }
    log.fetch.info({ expiresIn: parsed.data.expires_in }, "access token retrieved");
    return parsed.data.access_token;
  }

  async fetchDumpManifest(accessToken: string, entity: string): Promise<DumpManifest> {
    const url = `${this.options.dumpsUrl.replace(/\/+$/, "")}/${encodeURIComponent(entity)}`;
    const res = await this.fetchImpl(url, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        "Client-ID": this.options.clientId,
      },
    });
    if (!res.ok) {
      throw new RetrievalError(`dump manifest for ${entity} failed with HTTP ${res.status}`, {
        status: res.status,
        entity,
      });
    }

    const parsed = dumpManifestSchema.safeParse(await readJson(res, `dump manifest for ${entity}`));
    if (!parsed.success) {
      throw new RetrievalError(`dump manifest for ${entity} has no s3_url`, { status: res.status, entity });
    }
    return parsed.data;
  }

  async downloadDump(entity: string, signedUrl: string, destination: string): Promise<number> {
    const res = await this.fetchImpl(signedUrl);
    if (!res.ok) {
      throw new RetrievalError(`download of ${entity} dump failed with HTTP ${res.status}`, {
        status: res.status,
        entity,
      });
    }
    const body = Buffer.from(await res.arrayBuffer());
    await writeFile(destination, body);
    return body.byteLength;
  }

  /**
   * Refresh the dump files for `entities`. A token failure is thrown; a
   * per-entity failure is logged and reported in `failed`.
   */
  async fetchDumps(entities: readonly string[], dumpDir: string): Promise<FetchDumpsResult> {
    const token = await this.fetchAccessToken();
    await mkdir(dumpDir, { recursive: true });

    const result: FetchDumpsResult = { downloaded: [], failed: [] };
    for (const entity of entities) {
      try {
        const manifest = await this.fetchDumpManifest(token, entity);
        const path = join(dumpDir, `${entity}.csv`);
        const bytes = await this.downloadDump(entity, manifest.s3_url, path);
        result.downloaded.push({ entity, path, bytes });
        log.fetch.info({ entity, path, bytes }, "dump downloaded");
      } catch (err) {
        const reason = errorMessage(err);
        result.failed.push({ entity, reason });
        log.fetch.error({ entity, err: reason }, "dump retrieval failed");
      }
    }
    return result;
  }
}
