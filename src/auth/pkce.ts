/**
 * PKCE (Proof Key for Code Exchange) Utility
 *
 * Implements RFC 7636 for OAuth flows in desktop applications, plus the
 * CSRF state token that is round-tripped through the redirect.
 */

import { randomBytes, createHash, timingSafeEqual } from 'node:crypto';

export interface PKCEChallenge {
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: 'S256';
}

/**
 * Security parameter generator for desktop OAuth flows
 */
export class PKCEGenerator {
  /**
   * Generate a cryptographically secure code verifier
   * 96 random bytes -> 128 character base64url string, a subset of the unreserved set
   */
  static generateCodeVerifier(): string {
    return randomBytes(96).toString('base64url');
  }

  /**
   * Per RFC 7636: code_challenge = BASE64URL(SHA256(code_verifier))
   */
  static generateCodeChallenge(codeVerifier: string): string {
    return createHash('sha256')
      .update(codeVerifier)
      .digest('base64url');
  }

  /**
   * Generate complete PKCE challenge pair
   */
  static generateChallenge(): PKCEChallenge {
    const codeVerifier = this.generateCodeVerifier();
    const codeChallenge = this.generateCodeChallenge(codeVerifier);

    return {
      codeVerifier,
      codeChallenge,
      codeChallengeMethod: 'S256'
    };
  }

  /**
   * Opaque CSRF state token
   */
  static generateState(): string {
    return randomBytes(32).toString('base64url');
  }

  /**
   * Compare a returned state with the stored one.
   * Digests are compared so the check takes the same time whatever the input length.
   */
  static statesMatch(expected: string, received: string | undefined | null): boolean {
    if (!expected || typeof received !== 'string') {
      return false;
    }
    const a = createHash('sha256').update(expected).digest();
    const b = createHash('sha256').update(received).digest();
    return timingSafeEqual(a, b);
  }

  /**
   * Validate code verifier format
   */
  static isValidCodeVerifier(verifier: string): boolean {
    // Must be 43-128 characters from the unreserved URI set
    const validLength = verifier.length >= 43 && verifier.length <= 128;
    const validChars = /^[A-Za-z0-9\-._~]+$/.test(verifier);
    return validLength && validChars;
  }
}
