/**
 * Authentication module exports
 */

// Configuration
export { createAuthConfig } from "./config.js";
export type { AuthConfig } from "./config.js";

// Token utilities
export { generateToken, hashToken, validateTokenFormat } from "./tokens.js";
export type { TokenEnvironment } from "./tokens.js";

// Storage
export { InMemoryTokenStorage } from "./storage/memory.js";
export type {
  CallerToken,
  CreateTokenInput,
  TokenStorage,
} from "./storage/interface.js";

// Validator
export { BearerTokenValidator } from "./validator.js";
export type { AuthContext, AuthErrorCode, ValidationResult } from "./validator.js";
