export { generateCodeVerifier, generateCodeChallenge, generatePKCE, generateState } from './pkce';
export { buildAuthorizationUrl, joinScopes } from './authorizationUrl';
export { createRedirectListener } from './redirectListener';
export type { RedirectListener, ListenerApp } from './redirectListener';
export { startImplicitLogin, runImplicitSession, validateClientConfig } from './authorizationFlow';
export type { ImplicitLogin, ImplicitLoginOptions, ImplicitSessionOptions } from './authorizationFlow';
