import { timingSafeEqual } from 'node:crypto';
import type { AuthProvider, AuthResult } from './AuthProvider.js';

/**
 * Shared-secret check of the `X-API-Key` header against the agent's key.
 *
 * An empty configured key rejects every request. Keys are compared in
 * constant time.
 */
export class ApiKeyAuthProvider implements AuthProvider {
  private keyBuffer: Buffer;

  constructor(apiKey: string) {
    this.keyBuffer = Buffer.from(apiKey);
  }

  async verify(credentials: string | undefined): Promise<AuthResult> {
    if (this.keyBuffer.length === 0) {
      return { success: false, error: 'API key not configured' };
    }
    if (!credentials) {
      return { success: false, error: 'Missing API key' };
    }

    const credBuffer = Buffer.from(credentials);

    // timingSafeEqual needs equal lengths; compare the key with itself so a
    // length mismatch takes about as long as a content mismatch.
    let isValid: boolean;
    if (credBuffer.length === this.keyBuffer.length) {
      isValid = timingSafeEqual(credBuffer, this.keyBuffer);
    } else {
      timingSafeEqual(this.keyBuffer, this.keyBuffer);
      isValid = false;
    }

    return isValid ? { success: true } : { success: false, error: 'Invalid API key' };
  }
}
