import { timingSafeEqual } from "node:crypto";
import { generateState } from "./oauth/pkce";
import type { CompletionOutcome } from "./types";

/**
 * State of one handshake: the correlation value sent in the authorization
 * URL and the token captured by the redirect listener. Only the listener's
 * completion handler writes the token; the controller reads it after the
 * completion signal fired.
 */
export class AuthSession {
  private expectedState: string | null = null;
  private accessToken: string | null = null;

  /**
   * Generate a fresh correlation value and remember it. Calling this again
   * replaces the expected value.
   */
  issueState(): string {
    const state = generateState();
    this.expectedState = state;
    return state;
  }

  get state(): string | null {
    return this.expectedState;
  }

  get token(): string | null {
    return this.accessToken;
  }

  get completed(): boolean {
    return this.accessToken !== null;
  }

  matchesState(received: string): boolean {
    if (this.expectedState === null) return false;
    const expected = Buffer.from(this.expectedState, "utf8");
    const actual = Buffer.from(received, "utf8");
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  /**
   * Apply a token delivery from the redirect. The token is stored only when
   * the state matches and no earlier delivery succeeded.
   */
  receive(token: string | undefined, state: string | undefined): CompletionOutcome {
    if (!token) {
      return { type: "missing_token" };
    }
    if (this.completed) {
      return { type: "already_completed" };
    }
    if (state === undefined || !this.matchesState(state)) {
      return { type: "state_mismatch" };
    }
    this.accessToken = token;
    return { type: "authorized" };
  }
}
