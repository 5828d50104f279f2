/**
 * OAuth 2.0 token-in-fragment flow with PKCE.
 * Used for the single-user, single-shot Fitbit login of the CLI.
 */

import { REDIRECT_HOST, REDIRECT_PORT } from "../../constants";
import { createExportError, errorMessage, isExportError } from "../../errors";
import type { Logger } from "../../logger";
import { AuthSession } from "../session";
import type { BrowserLauncher, OAuthClientConfig, PKCEPair } from "../types";
import { buildAuthorizationUrl } from "./authorizationUrl";
import { generatePKCE } from "./pkce";
import { createRedirectListener, type RedirectListener } from "./redirectListener";

export interface ImplicitLoginOptions {
  config: OAuthClientConfig;
  logger: Logger;
  port?: number;               // Defaults to REDIRECT_PORT; tests bind 0
  host?: string;
  verifierLength?: number;
}

export interface ImplicitLogin {
  authUrl: string;
  pkce: PKCEPair;
  session: AuthSession;
  listener: RedirectListener;
  waitForToken: (timeoutMs?: number) => Promise<string>;
  close: () => Promise<void>;
}

export interface ImplicitSessionOptions extends ImplicitLoginOptions {
  openBrowser: BrowserLauncher;
  /** Runs with the token before the listener shuts down. */
  onAuthorized?: (accessToken: string) => Promise<void>;
  /** Give up waiting for the redirect after this long. Waits forever when unset. */
  timeoutMs?: number;
}

export function validateClientConfig(config: OAuthClientConfig): void {
  if (!config.clientId || !config.redirectUrl) {
    throw createExportError("The clientID and redirect URL cannot be empty.", "CONFIGURATION");
  }
}

function withTimeout(promise: Promise<string>, timeoutMs: number | undefined): Promise<string> {
  if (timeoutMs === undefined) {
    return promise;
  }
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(createExportError(
        `No authorization received within ${Math.round(timeoutMs / 1000)}s`,
        "AUTH_TIMEOUT"
      ));
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Generate PKCE + state, build the authorization URL and start the redirect
 * listener. The caller opens the URL and waits for the token.
 */
export async function startImplicitLogin(options: ImplicitLoginOptions): Promise<ImplicitLogin> {
  validateClientConfig(options.config);

  const session = new AuthSession();
  const pkce = generatePKCE(options.verifierLength);
  const authUrl = buildAuthorizationUrl(pkce.codeChallenge, options.config, session);

  const listener = createRedirectListener(session, options.logger);
  let address: string;
  try {
    address = await listener.listen(options.port ?? REDIRECT_PORT, options.host ?? REDIRECT_HOST);
  } catch (error) {
    await listener.close();
    throw error;
  }
  options.logger.debug(`Redirect listener ready at ${address}`);

  return {
    authUrl,
    pkce,
    session,
    listener,
    waitForToken: (timeoutMs) => withTimeout(listener.waitForToken(), timeoutMs),
    close: listener.close,
  };
}

/**
 * Full handshake: start the listener, open the browser, wait for the token,
 * run the post-handshake action, then shut the listener down once.
 */
export async function runImplicitSession(options: ImplicitSessionOptions): Promise<string> {
  const login = await startImplicitLogin(options);

  try {
    await options.openBrowser(login.authUrl);
  } catch (error) {
    await login.close();
    if (isExportError(error)) throw error;
    throw createExportError(`Error opening browser: ${errorMessage(error)}`, "BROWSER_LAUNCH", error);
  }

  options.logger.info("Waiting for authorization in the browser...");

  try {
    const accessToken = await login.waitForToken(options.timeoutMs);
    if (options.onAuthorized) {
      await options.onAuthorized(accessToken);
    }
    return accessToken;
  } finally {
    await login.close();
  }
}
