/**
 * Package version lookup
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";

/**
 * Read the version of the running hookstamp package
 * package.json sits two levels above this module in both src/ and dist/.
 *
 * @returns The package version, or null if package.json cannot be read
 */
export const getCurrentPackageVersion = (): string | null => {
  try {
    const packageJsonPath = fileURLToPath(
      new URL("../../package.json", import.meta.url),
    );
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      parsed != null &&
      typeof parsed === "object" &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
    return null;
  } catch {
    return null;
  }
};
