import http from "http";
import open from "open";

import { AuthenticationError, errorMessage } from "./errors.js";

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

const PLAIN_TEXT = { "Content-Type": "text/plain", Connection: "close" };

const SUCCESS_PAGE = "Authentication successful! You can close this window and return to the terminal.";

export interface LocalAuthOptions {
  authorizeUrl: string;
  redirectUri: string;
  state: string;
  timeoutMs?: number;
  openBrowser?: (url: string) => Promise<unknown>;
  log?: (message: string) => void;
}

/**
 * Serves the redirect URI on loopback, sends the user to the authorization
 * page and resolves with the authorization code from the redirect.
 */
export function authenticate(options: LocalAuthOptions): Promise<string> {
  const redirect = new URL(options.redirectUri);
  const openBrowser = options.openBrowser ?? open;
  const log = options.log ?? ((message: string) => process.stderr.write(`${message}\n`));

  return new Promise<string>((resolve, reject) => {
    let settled = false;

    const server = http.createServer((req, res) => {
      let url: URL;
      try {
        url = new URL(req.url ?? "/", redirect.origin);
      } catch (error) {
        log(`Ignoring malformed request to the redirect server: ${errorMessage(error)}`);
        res.writeHead(400, PLAIN_TEXT);
        res.end("Bad request");
        return;
      }
      if (url.pathname !== redirect.pathname) {
        res.writeHead(404, PLAIN_TEXT);
        res.end("Not found");
        return;
      }

      const error = url.searchParams.get("error");
      const code = url.searchParams.get("code");

      if (error) {
        res.writeHead(400, PLAIN_TEXT);
        res.end(`Authorization failed: ${error}`);
        finish(new AuthenticationError(`Spotify authorization was declined: ${error}`));
        return;
      }
      if (url.searchParams.get("state") !== options.state) {
        res.writeHead(400, PLAIN_TEXT);
        res.end("Authorization failed: state mismatch");
        finish(new AuthenticationError("Spotify authorization returned an unexpected state parameter"));
        return;
      }
      if (!code) {
        res.writeHead(400, PLAIN_TEXT);
        res.end("Authorization failed: missing code");
        finish(new AuthenticationError("Spotify authorization redirect did not include a code"));
        return;
      }

      res.writeHead(200, PLAIN_TEXT);
      res.end(SUCCESS_PAGE);
      finish(null, code);
    });

    const timer = setTimeout(() => {
      finish(
        new AuthenticationError(
          `Timed out waiting for the authorization redirect to ${options.redirectUri}. ` +
            "Check that SPOTIFY_REDIRECT_URI matches the redirect URI registered for the app."
        )
      );
    }, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    function finish(error: Error | null, code?: string): void {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      server.close();
      if (error || code === undefined) {
        reject(error ?? new AuthenticationError("Spotify authorization did not complete"));
      } else {
        resolve(code);
      }
    }

    server.on("error", (error) => {
      finish(new AuthenticationError(`Could not listen on ${redirect.host}: ${error.message}`, { cause: error }));
    });

    const port = redirect.port ? Number(redirect.port) : 80;
    server.listen(port, redirect.hostname, () => {
      log(`Open this URL to authorize the player:\n${options.authorizeUrl}`);
      openBrowser(options.authorizeUrl).catch((error: unknown) => {
        log(`Could not open a browser automatically: ${errorMessage(error)}`);
      });
    });
  });
}
