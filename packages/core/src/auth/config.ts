/**
 * Authentication configuration
 */
export interface AuthConfig {
  enabled: boolean;
}

/**
 * Create auth configuration from environment variables.
 * Authentication is on unless AUTH_ENABLED is "false".
 */
export function createAuthConfig(
  env: Record<string, string | undefined> = process.env
): AuthConfig {
  return {
    enabled: env.AUTH_ENABLED !== "false",
  };
}
