import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import type { PlayerConfig } from "./config.js";
import { AuthenticationError } from "./errors.js";
import type { LocalAuthOptions } from "./localAuth.js";
import {
  authorize,
  loadSavedTokenIfExist,
  requiredScopes,
  saveToken,
  SpotifySession,
  type StoredToken
} from "./spotifyClient.js";
import { createFakeSpotifyApi } from "./testing/fakeSpotifyApi.js";

const NOW = 1_700_000_000_000;

let tempDir: string;
let config: PlayerConfig;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "spotify-player-"));
  config = {
    credentials: { clientId: "test-client", clientSecret: "test-secret", redirectUri: "http://127.0.0.1:8888/callback" },
    tokenPath: path.join(tempDir, "nested", "token.json")
  };
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

function cachedToken(overrides: Partial<StoredToken> = {}): StoredToken {
  return {
    client_id: "test-client",
    access_token: "cached-access",
    refresh_token: "cached-refresh",
    expiry_date: NOW + 30 * 60 * 1000,
    scope: "user-read-playback-state",
    ...overrides
  };
}

async function writeCache(content: string): Promise<void> {
  await fs.mkdir(path.dirname(config.tokenPath), { recursive: true });
  await fs.writeFile(config.tokenPath, content);
}

async function readCache(): Promise<unknown> {
  return JSON.parse(await fs.readFile(config.tokenPath, "utf-8"));
}

function setup() {
  const api = createFakeSpotifyApi();
  const authenticate = vi.fn(async (options: LocalAuthOptions) => "auth-code");
  const log = vi.fn((message: string) => undefined);
  return { api, authenticate, log, options: { api, authenticate, log, now: () => NOW } };
}

describe("authorize", () => {
  it("runs the local authorization flow when there is no cached token", async () => {
    const { api, authenticate, options } = setup();

    const session = await authorize(config, options);

    expect(authenticate).toHaveBeenCalledTimes(1);
    const [localAuth] = authenticate.mock.calls[0];
    expect(api.createAuthorizeURL).toHaveBeenCalledWith(requiredScopes, localAuth.state);
    expect(localAuth.authorizeUrl).toBe(`https://accounts.example.test/authorize?state=${localAuth.state}`);
    expect(localAuth.redirectUri).toBe("http://127.0.0.1:8888/callback");
    expect(localAuth.state).toMatch(/^[0-9a-f]{32}$/);
    expect(api.authorizationCodeGrant).toHaveBeenCalledWith("auth-code");
    expect(api.setAccessToken).toHaveBeenLastCalledWith("access-1");
    expect(api.setRefreshToken).toHaveBeenLastCalledWith("refresh-1");

    const expected = {
      client_id: "test-client",
      access_token: "access-1",
      refresh_token: "refresh-1",
      expiry_date: NOW + 3600 * 1000,
      scope: "user-read-playback-state"
    };
    expect(session.currentToken).toEqual(expected);
    await expect(readCache()).resolves.toEqual(expected);
  });

  it("reuses a cached token that is still valid", async () => {
    const { api, authenticate, options } = setup();
    await writeCache(JSON.stringify(cachedToken()));

    const session = await authorize(config, options);

    expect(authenticate).not.toHaveBeenCalled();
    expect(api.refreshAccessToken).not.toHaveBeenCalled();
    expect(api.setAccessToken).toHaveBeenCalledWith("cached-access");
    expect(session.currentToken.access_token).toBe("cached-access");
  });

  it("refreshes an expired cached token and keeps its refresh token", async () => {
    const { api, authenticate, options } = setup();
    await writeCache(JSON.stringify(cachedToken({ expiry_date: NOW - 1000 })));

    const session = await authorize(config, options);

    expect(authenticate).not.toHaveBeenCalled();
    expect(api.refreshAccessToken).toHaveBeenCalledTimes(1);
    const expected = {
      client_id: "test-client",
      access_token: "access-2",
      refresh_token: "cached-refresh",
      expiry_date: NOW + 3600 * 1000,
      scope: "user-read-playback-state"
    };
    expect(session.currentToken).toEqual(expected);
    await expect(readCache()).resolves.toEqual(expected);
  });

  it("signs in again when the cached token cannot be refreshed", async () => {
    const { api, authenticate, log, options } = setup();
    await writeCache(JSON.stringify(cachedToken({ expiry_date: NOW })));
    api.refreshAccessToken.mockRejectedValueOnce(new Error("invalid_grant"));

    const session = await authorize(config, options);

    expect(log).toHaveBeenCalledWith("Cached Spotify token could not be refreshed (invalid_grant); signing in again.");
    expect(authenticate).toHaveBeenCalledTimes(1);
    expect(session.currentToken.access_token).toBe("access-1");
  });

  it("ignores a cache written for another client", async () => {
    const { authenticate, options } = setup();
    await writeCache(JSON.stringify(cachedToken({ client_id: "other-client" })));

    await authorize(config, options);

    expect(authenticate).toHaveBeenCalledTimes(1);
  });

  it("ignores an unreadable cache", async () => {
    const { authenticate, log, options } = setup();
    await writeCache("{not json");

    await authorize(config, options);

    expect(log).toHaveBeenCalledWith(expect.stringContaining(`Ignoring unreadable token cache at ${config.tokenPath}`));
    expect(authenticate).toHaveBeenCalledTimes(1);
  });

  it("propagates a declined authorization unchanged", async () => {
    const { authenticate, options } = setup();
    const declined = new AuthenticationError("Spotify authorization was declined: access_denied");
    authenticate.mockRejectedValueOnce(declined);

    await expect(authorize(config, options)).rejects.toBe(declined);
  });

  it("wraps token exchange failures in an AuthenticationError", async () => {
    const { api, options } = setup();
    api.authorizationCodeGrant.mockRejectedValueOnce(
      Object.assign(new Error("An authentication error occurred"), {
        statusCode: 400,
        body: { error: "invalid_client", error_description: "Invalid client secret" }
      })
    );

    const result = authorize(config, options);

    await expect(result).rejects.toBeInstanceOf(AuthenticationError);
    await expect(result).rejects.toThrow("Error authenticating with Spotify: Spotify API error 400: Invalid client secret");
  });

  it("fails when the grant carries no refresh token", async () => {
    const { api, options } = setup();
    api.authorizationCodeGrant.mockResolvedValueOnce({ body: { access_token: "access-1", expires_in: 3600 } });

    await expect(authorize(config, options)).rejects.toThrow("Spotify did not return a refresh token");
  });
});

describe("SpotifySession", () => {
  it("refreshes before handing out the client once the token is about to expire", async () => {
    const api = createFakeSpotifyApi();
    let clock = NOW;
    const session = new SpotifySession(api, cachedToken({ expiry_date: NOW + 5 * 60 * 1000 }), config.tokenPath, () => clock);

    await session.client();
    expect(api.refreshAccessToken).not.toHaveBeenCalled();

    clock = NOW + 4.5 * 60 * 1000;
    await expect(session.client()).resolves.toBe(api);
    expect(api.refreshAccessToken).toHaveBeenCalledTimes(1);
    expect(api.setAccessToken).toHaveBeenLastCalledWith("access-2");
    await expect(readCache()).resolves.toMatchObject({ access_token: "access-2", expiry_date: clock + 3600 * 1000 });
  });
});

describe("loadSavedTokenIfExist", () => {
  it("returns null when the cache file does not exist", async () => {
    await expect(loadSavedTokenIfExist(config.tokenPath, "test-client")).resolves.toBeNull();
  });

  it("returns null for a cache missing required fields", async () => {
    await writeCache(JSON.stringify({ client_id: "test-client", access_token: "cached-access" }));
    await expect(loadSavedTokenIfExist(config.tokenPath, "test-client")).resolves.toBeNull();
  });
});

describe("saveToken", () => {
  it("tightens the permissions of an existing cache file", async () => {
    await writeCache("{}");
    await fs.chmod(config.tokenPath, 0o644);

    await saveToken(config.tokenPath, cachedToken());

    const { mode } = await fs.stat(config.tokenPath);
    expect(mode & 0o777).toBe(0o600);
    await expect(readCache()).resolves.toEqual(cachedToken());
  });
});
