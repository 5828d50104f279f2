/**
 * PKCE (RFC 7636) and anti-forgery state generation.
 * All randomness comes from crypto.randomInt, which is uniform over the range.
 */

import { createHash, randomInt } from "node:crypto";
import { createExportError } from "../../errors";
import type { PKCEPair } from "../types";

// RFC 3986 unreserved characters
const UNRESERVED_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~";
const ALPHANUMERIC_CHARS = "abcdefghijklmnopqrstuvwxyz0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ";

export const MIN_VERIFIER_LENGTH = 43;
export const MAX_VERIFIER_LENGTH = 128;
export const STATE_LENGTH = 32;

function randomString(alphabet: string, length: number): string {
  let result = "";
  for (let i = 0; i < length; i++) {
    result += alphabet[randomInt(alphabet.length)];
  }
  return result;
}

export function generateCodeVerifier(length: number = MIN_VERIFIER_LENGTH): string {
  if (!Number.isInteger(length) || length < MIN_VERIFIER_LENGTH || length > MAX_VERIFIER_LENGTH) {
    throw createExportError(
      `Code verifier length must be between ${MIN_VERIFIER_LENGTH} and ${MAX_VERIFIER_LENGTH} characters, got ${length}`,
      "INVALID_LENGTH"
    );
  }
  return randomString(UNRESERVED_CHARS, length);
}

export function generateCodeChallenge(codeVerifier: string): string {
  if (codeVerifier === "") {
    throw createExportError("Code verifier must not be empty", "EMPTY_INPUT");
  }
  return createHash("sha256").update(codeVerifier, "utf8").digest("base64url");
}

export function generatePKCE(length?: number): PKCEPair {
  const codeVerifier = generateCodeVerifier(length);
  return { codeVerifier, codeChallenge: generateCodeChallenge(codeVerifier) };
}

export function generateState(): string {
  return randomString(ALPHANUMERIC_CHARS, STATE_LENGTH);
}
