/**
 * Auth types and OAuth client configuration
 */

// Client configuration read from credentials.json
export interface OAuthClientConfig {
  clientId: string;
  clientSecret?: string;       // Unused by the token-in-fragment flow
  redirectUrl: string;
  scopes: string[];
  authorizeUrl: string;
}

// PKCE pair (RFC 7636)
export interface PKCEPair {
  codeVerifier: string;
  codeChallenge: string;
}

// Outcome of a request to the completion endpoint
export type CompletionOutcome =
  | { type: "authorized" }
  | { type: "missing_token" }
  | { type: "state_mismatch" }
  | { type: "already_completed" };

// Opens a URL in the user's browser. Rejections are fatal to the session.
export type BrowserLauncher = (url: string) => Promise<void>;
