import { loadConfig, type PlayerConfig } from "./config.js";
import { AuthenticationError, errorMessage } from "./errors.js";
import { PlayerMenu } from "./menu.js";
import { SpotifyPlaybackControls, type SpotifyClientSource } from "./playback.js";
import { authorize } from "./spotifyClient.js";
import { ConsoleTerminal, type Terminal } from "./terminal.js";

export interface PlayerOptions {
  version?: string;
  authorize?: (config: PlayerConfig) => Promise<SpotifyClientSource>;
  createTerminal?: () => Terminal;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Signs in, then runs the menu until Exit or end of input. Resolves with the
 * process exit status: 0 after the menu ends, 1 when startup fails.
 */
export async function runPlayer(env: NodeJS.ProcessEnv = process.env, options: PlayerOptions = {}): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = options.stderr ?? ((text: string) => process.stderr.write(text));
  const signIn = options.authorize ?? authorize;
  const createTerminal = options.createTerminal ?? (() => new ConsoleTerminal());

  stdout(`Starting Spotify Terminal Player v${options.version ?? "0.0.0"}...\n`);

  let session: SpotifyClientSource;
  try {
    session = await signIn(loadConfig(env));
  } catch (error) {
    const prefix = error instanceof AuthenticationError ? "Authentication failed" : "Unexpected error";
    stderr(`${prefix}: ${errorMessage(error)}\n`);
    return 1;
  }

  const terminal = createTerminal();
  try {
    return await new PlayerMenu(new SpotifyPlaybackControls(session), terminal).run();
  } finally {
    terminal.close();
  }
}
