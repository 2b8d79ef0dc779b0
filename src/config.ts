import os from "os";
import path from "path";
import { z, ZodIssue } from "zod";

import { AuthenticationError } from "./errors.js";

export const DEFAULT_REDIRECT_URI = "http://127.0.0.1:8888/callback";

export const DEFAULT_TOKEN_PATH = path.join(os.homedir(), ".config", "spotify-terminal-player", "token.json");

export interface Credentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface PlayerConfig {
  credentials: Credentials;
  tokenPath: string;
}

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const requiredSetting = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }).trim());

const envSchema = z.object({
  SPOTIFY_CLIENT_ID: requiredSetting("SPOTIFY_CLIENT_ID"),
  SPOTIFY_CLIENT_SECRET: requiredSetting("SPOTIFY_CLIENT_SECRET"),
  SPOTIFY_REDIRECT_URI: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .url("SPOTIFY_REDIRECT_URI must be a valid URL")
      .refine((value) => value.startsWith("http://"), "SPOTIFY_REDIRECT_URI must use http://")
      .default(DEFAULT_REDIRECT_URI)
  ),
  SPOTIFY_TOKEN_PATH: z.preprocess(blankToUndefined, z.string().trim().optional())
});

// Spotipy-style names (SPOTIPY_CLIENT_ID, ...) are read when the SPOTIFY_ ones are unset.
const LEGACY_SETTINGS = ["CLIENT_ID", "CLIENT_SECRET", "REDIRECT_URI"] as const;

function withLegacyNames(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const merged: NodeJS.ProcessEnv = { ...env };
  for (const setting of LEGACY_SETTINGS) {
    if (blankToUndefined(merged[`SPOTIFY_${setting}`]) === undefined) {
      merged[`SPOTIFY_${setting}`] = env[`SPOTIPY_${setting}`];
    }
  }
  return merged;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlayerConfig {
  const parsed = envSchema.safeParse(withLegacyNames(env));
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue: ZodIssue) => issue.message).join("; ");
    throw new AuthenticationError(`Spotify credentials are not configured: ${message}`);
  }

  return {
    credentials: {
      clientId: parsed.data.SPOTIFY_CLIENT_ID,
      clientSecret: parsed.data.SPOTIFY_CLIENT_SECRET,
      redirectUri: parsed.data.SPOTIFY_REDIRECT_URI
    },
    tokenPath: parsed.data.SPOTIFY_TOKEN_PATH ?? DEFAULT_TOKEN_PATH
  };
}
