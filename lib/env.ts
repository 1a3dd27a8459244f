/**
 * Environment detection utilities
 */

export type Environment = "prod" | "dev" | "test";

/**
 * Get the current environment
 *
 * Detection logic:
 * - Test: NODE_ENV === "test" (Jest sets this)
 * - Production: NODE_ENV === "production"
 * - Development: everything else
 */
export function getEnvironment(): Environment {
  if (process.env.NODE_ENV === "test") {
    return "test";
  }

  if (process.env.NODE_ENV === "production") {
    return "prod";
  }

  return "dev";
}
