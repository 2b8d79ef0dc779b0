import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import SpotifyWebApi from "spotify-web-api-node";
import { z } from "zod";

import type { Credentials, PlayerConfig } from "./config.js";
import { AuthenticationError, describeError, errorMessage } from "./errors.js";
import { authenticate, type LocalAuthOptions } from "./localAuth.js";

const SCOPES = [
  "user-read-playback-state",
  "user-modify-playback-state",
  "user-read-currently-playing",
  "playlist-read-private"
];

// Refresh this long before Spotify's reported expiry.
const EXPIRY_MARGIN_MS = 60 * 1000;

export interface ApiResponse<T> {
  body: T;
}

export interface TrackItem {
  type: "track";
  name: string;
  uri: string;
  duration_ms: number;
  artists: Array<{ name: string }>;
  album: { name: string };
}

export interface EpisodeItem {
  type: "episode";
  name: string;
  uri: string;
  duration_ms: number;
  show: { name: string };
}

export interface PlaylistItem {
  name: string;
  uri: string;
  tracks: { total: number };
  owner: { id: string; display_name?: string | null };
}

export interface PlaybackStateBody {
  is_playing: boolean;
  progress_ms: number | null;
  shuffle_state: boolean;
  repeat_state: string;
  item: TrackItem | EpisodeItem | null;
  device: { name: string; volume_percent: number | null };
}

/** The slice of spotify-web-api-node the player calls during a session. */
export interface SpotifyPlayerApi {
  getMyCurrentPlaybackState(): Promise<ApiResponse<PlaybackStateBody | undefined>>;
  play(options?: { uris?: string[]; context_uri?: string }): Promise<unknown>;
  pause(): Promise<unknown>;
  skipToNext(): Promise<unknown>;
  skipToPrevious(): Promise<unknown>;
  setVolume(volumePercent: number): Promise<unknown>;
  searchTracks(query: string, options?: { limit?: number }): Promise<ApiResponse<{ tracks?: { items: TrackItem[] } }>>;
  getUserPlaylists(options?: { limit?: number }): Promise<ApiResponse<{ items: PlaylistItem[] }>>;
}

export interface GrantedToken {
  access_token: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
}

export interface SpotifyAuthApi {
  createAuthorizeURL(scopes: string[], state: string): string;
  authorizationCodeGrant(code: string): Promise<ApiResponse<GrantedToken>>;
  refreshAccessToken(): Promise<ApiResponse<GrantedToken>>;
  setAccessToken(accessToken: string): void;
  setRefreshToken(refreshToken: string): void;
}

export type SpotifyApi = SpotifyAuthApi & SpotifyPlayerApi;

const storedTokenSchema = z.object({
  client_id: z.string(),
  access_token: z.string(),
  refresh_token: z.string(),
  expiry_date: z.number(),
  scope: z.string().optional()
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

type Log = (message: string) => void;

const writeStderr: Log = (message) => {
  process.stderr.write(`${message}\n`);
};

export function createSpotifyApi(credentials: Credentials): SpotifyApi {
  return new SpotifyWebApi({
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    redirectUri: credentials.redirectUri
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadSavedTokenIfExist(tokenPath: string, clientId: string, log: Log = writeStderr): Promise<StoredToken | null> {
  let content: string;
  try {
    content = await fs.readFile(tokenPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    log(`Ignoring unreadable token cache at ${tokenPath}: ${errorMessage(error)}`);
    return null;
  }

  const parsed = storedTokenSchema.safeParse(json);
  if (!parsed.success || parsed.data.client_id !== clientId) {
    return null;
  }
  return parsed.data;
}

export async function saveToken(tokenPath: string, token: StoredToken): Promise<void> {
  await fs.mkdir(path.dirname(tokenPath), { recursive: true });
  await fs.writeFile(tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
  // writeFile only applies the mode when it creates the file.
  await fs.chmod(tokenPath, 0o600);
}

export function toStoredToken(clientId: string, grant: GrantedToken, now: number, previous?: StoredToken): StoredToken {
  const refreshToken = grant.refresh_token ?? previous?.refresh_token;
  if (!refreshToken) {
    throw new AuthenticationError("Spotify did not return a refresh token");
  }
  return {
    client_id: clientId,
    access_token: grant.access_token,
    refresh_token: refreshToken,
    expiry_date: now + grant.expires_in * 1000,
    scope: grant.scope ?? previous?.scope
  };
}

/**
 * The authenticated handle for the lifetime of the process. Hands out the
 * API client, refreshing the access token first when it is about to expire.
 */
export class SpotifySession {
  constructor(
    private readonly api: SpotifyApi,
    private token: StoredToken,
    private readonly tokenPath: string,
    private readonly now: () => number = Date.now
  ) {
    this.installToken();
  }

  get currentToken(): StoredToken {
    return this.token;
  }

  isExpiring(): boolean {
    return this.token.expiry_date - EXPIRY_MARGIN_MS <= this.now();
  }

  async client(): Promise<SpotifyPlayerApi> {
    if (this.isExpiring()) {
      await this.refresh();
    }
    return this.api;
  }

  async refresh(): Promise<void> {
    const response = await this.api.refreshAccessToken();
    this.token = toStoredToken(this.token.client_id, response.body, this.now(), this.token);
    this.installToken();
    await saveToken(this.tokenPath, this.token);
  }

  private installToken(): void {
    this.api.setAccessToken(this.token.access_token);
    this.api.setRefreshToken(this.token.refresh_token);
  }
}

export interface AuthorizeOptions {
  api?: SpotifyApi;
  authenticate?: (options: LocalAuthOptions) => Promise<string>;
  now?: () => number;
  log?: Log;
}

export async function authorize(config: PlayerConfig, options: AuthorizeOptions = {}): Promise<SpotifySession> {
  const { credentials, tokenPath } = config;
  const api = options.api ?? createSpotifyApi(credentials);
  const now = options.now ?? Date.now;
  const log = options.log ?? writeStderr;
  const runLocalAuth = options.authenticate ?? authenticate;

  try {
    const cached = await loadSavedTokenIfExist(tokenPath, credentials.clientId, log);
    if (cached) {
      const session = new SpotifySession(api, cached, tokenPath, now);
      if (!session.isExpiring()) {
        return session;
      }
      try {
        await session.refresh();
        return session;
      } catch (error) {
        log(`Cached Spotify token could not be refreshed (${describeError(error)}); signing in again.`);
      }
    }

    const state = randomBytes(16).toString("hex");
    const code = await runLocalAuth({
      authorizeUrl: api.createAuthorizeURL([...SCOPES], state),
      redirectUri: credentials.redirectUri,
      state,
      log
    });

    const grant = await api.authorizationCodeGrant(code);
    const token = toStoredToken(credentials.clientId, grant.body, now());
    await saveToken(tokenPath, token);
    return new SpotifySession(api, token, tokenPath, now);
  } catch (error) {
    if (error instanceof AuthenticationError) {
      throw error;
    }
    throw new AuthenticationError(`Error authenticating with Spotify: ${describeError(error)}`, { cause: error });
  }
}

export const requiredScopes = [...SCOPES];
