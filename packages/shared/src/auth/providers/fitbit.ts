/**
 * Fitbit OAuth provider
 * Token-in-fragment flow with PKCE; the access token is delivered in the
 * redirect fragment and never exchanged server-side.
 */

import { FITBIT_AUTHORIZE_URL, FITBIT_SCOPES } from "../../constants";
import type { Credentials } from "../credentials";
import type { OAuthClientConfig } from "../types";

export function createFitbitClientConfig(credentials: Credentials): OAuthClientConfig {
  return {
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    redirectUrl: credentials.redirectUrl,
    scopes: [...FITBIT_SCOPES],
    authorizeUrl: FITBIT_AUTHORIZE_URL,
  };
}
