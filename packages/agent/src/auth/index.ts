export type { AuthProvider, AuthResult } from './AuthProvider.js';
export { ApiKeyAuthProvider } from './ApiKeyAuthProvider.js';
