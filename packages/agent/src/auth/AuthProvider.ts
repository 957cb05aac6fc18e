/**
 * Result of an authentication verification.
 */
export interface AuthResult {
  success: boolean;
  error?: string;
}

/**
 * Checks the credentials presented on an inbound request.
 */
export interface AuthProvider {
  verify(credentials: string | undefined): Promise<AuthResult>;
}
