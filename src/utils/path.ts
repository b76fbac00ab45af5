/**
 * Path utility functions for command-line arguments
 */

import * as os from "os";
import * as path from "path";

/**
 * Normalize a path given on the command line
 * @param args - Configuration arguments
 * @param args.value - The path as typed (optional)
 * @param args.cwd - Directory relative paths resolve against (defaults to process.cwd())
 *
 * @returns Absolute, normalized path without a trailing slash; cwd when value is empty
 */
export const normalizePath = (args: {
  value?: string | null;
  cwd?: string | null;
}): string => {
  const { value } = args;
  const cwd = args.cwd || process.cwd();

  if (value == null || value === "") {
    return cwd;
  }

  let normalizedPath = value;

  // Expand tilde to home directory
  if (normalizedPath.startsWith("~/")) {
    normalizedPath = path.join(os.homedir(), normalizedPath.slice(2));
  } else if (normalizedPath === "~") {
    normalizedPath = os.homedir();
  }

  // Resolve relative paths to absolute
  if (!path.isAbsolute(normalizedPath)) {
    normalizedPath = path.join(cwd, normalizedPath);
  }

  // Normalize the path (resolves . and .., normalizes multiple slashes)
  normalizedPath = path.normalize(normalizedPath);

  // Remove trailing slash if present (except for root)
  if (normalizedPath.length > 1 && normalizedPath.endsWith("/")) {
    normalizedPath = normalizedPath.slice(0, -1);
  }

  return normalizedPath;
};
