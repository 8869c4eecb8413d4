import { readFileSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { GoogleTokenProvider } from "./google-token";
import { PermanentRunError, TransientError } from "@/lib/errors";
import { stubHttp, type Responder } from "@/test/http";
import { makeTempDir } from "@/test/fakes";

const NOW = Date.parse("2024-05-01T10:00:00Z");

const CREDENTIALS = {
  client_id: "test-client",
  client_secret: "test-secret",
  refresh_token: "test-refresh",
  scopes: ["https://www.googleapis.com/auth/youtube.upload"],
};

const refreshed: Responder = () => ({
  status: 200,
  data: { access_token: "fresh-token", expires_in: 3600, token_type: "Bearer" },
});

describe("GoogleTokenProvider", () => {
  let dir: string;
  let tokenFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    tokenFile = path.join(dir, "youtube_token.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function provider(contents: unknown, responder: Responder = refreshed) {
    await fs.writeFile(tokenFile, typeof contents === "string" ? contents : JSON.stringify(contents));
    const { http, requests } = stubHttp(responder);
    return { tokens: new GoogleTokenProvider(tokenFile, http, () => NOW), requests };
  }

  it("uses a stored token that is still valid", async () => {
    const { tokens, requests } = await provider({
      ...CREDENTIALS,
      token: "stored-token",
      expiry: "2024-05-01T11:00:00Z",
    });

    await expect(tokens.getAccessToken()).resolves.toBe("stored-token");
    expect(requests).toHaveLength(0);
  });

  it("refreshes a token that is about to expire and saves it", async () => {
    const { tokens, requests } = await provider({
      ...CREDENTIALS,
      token: "old-token",
      expiry: "2024-05-01T10:00:30Z",
    });

    await expect(tokens.getAccessToken()).resolves.toBe("fresh-token");

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("https://oauth2.googleapis.com/token");
    const form = new URLSearchParams(String(requests[0].data));
    expect(form.get("grant_type")).toBe("refresh_token");
    expect(form.get("refresh_token")).toBe("test-refresh");

    const saved: unknown = JSON.parse(readFileSync(tokenFile, "utf8"));
    expect(saved).toEqual({
      ...CREDENTIALS,
      token: "fresh-token",
      expiry: "2024-05-01T11:00:00.000Z",
    });
  });

  it("reuses the refreshed token until it nears expiry", async () => {
    const { tokens, requests } = await provider(CREDENTIALS);

    await tokens.getAccessToken();
    await tokens.getAccessToken();

    expect(requests).toHaveLength(1);
  });

  it("posts to the token_uri from the file", async () => {
    const { tokens, requests } = await provider({ ...CREDENTIALS, token_uri: "https://auth.test/token" });

    await tokens.getAccessToken();

    expect(requests[0].url).toBe("https://auth.test/token");
  });

  it("treats a refused refresh as fatal for the run", async () => {
    const { tokens } = await provider(CREDENTIALS, () => ({
      status: 400,
      data: { error: "invalid_grant" },
    }));

    const error = await tokens.getAccessToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentRunError);
    expect(error).toMatchObject({ statusCode: 400, phase: "auth" });
  });

  it("retries a token endpoint outage", async () => {
    const { tokens } = await provider(CREDENTIALS, () => ({ status: 503 }));

    await expect(tokens.getAccessToken()).rejects.toBeInstanceOf(TransientError);
  });

  it("rejects a missing, unreadable or incomplete token file", async () => {
    const { http } = stubHttp(refreshed);
    const missing = new GoogleTokenProvider(path.join(dir, "nope.json"), http, () => NOW);
    await expect(missing.getAccessToken()).rejects.toBeInstanceOf(PermanentRunError);

    const garbled = await provider("{not json");
    await expect(garbled.tokens.getAccessToken()).rejects.toThrow("is not valid JSON");

    const incomplete = await provider({ client_id: "test-client" });
    await expect(incomplete.tokens.getAccessToken()).rejects.toThrow(
      "needs client_id, client_secret and refresh_token"
    );
  });
});
