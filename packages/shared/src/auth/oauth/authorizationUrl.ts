import type { AuthSession } from "../session";
import type { OAuthClientConfig } from "../types";

/**
 * Join scopes with "+". Fitbit expects the literal separator, so the value is
 * not passed through URLSearchParams (which would encode it).
 */
export function joinScopes(scopes: string[]): string {
  return scopes.join("+");
}

/**
 * Build the Fitbit authorization URL for the token-in-fragment flow with PKCE.
 * Issues a fresh correlation state on the session.
 */
export function buildAuthorizationUrl(
  codeChallenge: string,
  config: Pick<OAuthClientConfig, "clientId" | "redirectUrl" | "scopes" | "authorizeUrl">,
  session: AuthSession
): string {
  const params = [
    "response_type=token",
    `client_id=${encodeURIComponent(config.clientId)}`,
    `redirect_uri=${encodeURIComponent(config.redirectUrl)}`,
    `scope=${joinScopes(config.scopes)}`,
    `code_challenge=${encodeURIComponent(codeChallenge)}`,
    "code_challenge_method=S256",
    `state=${session.issueState()}`,
  ];
  return `${config.authorizeUrl}?${params.join("&")}`;
}
