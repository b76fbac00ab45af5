/**
 * Validate Command
 *
 * Checks a manifest file against the schema and lists every violation.
 */

import { DEFAULT_NAMESPACE } from "@/cli/config.js";
import { formatError } from "@/cli/errors.js";
import { getManifestPath, loadManifest } from "@/cli/features/manifest/manifest.js";
import { error, success } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type { Command } from "commander";

/**
 * Validate a manifest file
 * @param args - Validation arguments
 * @param args.manifestPath - Path to the manifest
 *
 * @returns Process exit code: 0 when valid, 1 otherwise
 */
export const runValidate = async (args: {
  manifestPath: string;
}): Promise<number> => {
  const { manifestPath } = args;

  try {
    const manifest = await loadManifest({ manifestPath });
    if (manifest == null) {
      error({ message: `Build manifest not found at ${manifestPath}` });
      return 1;
    }
    success({
      message: `✓ ${manifestPath} is valid (${Object.keys(manifest.hooks).length} hooks)`,
    });
    return 0;
  } catch (err) {
    for (const line of formatError(err)) {
      error({ message: line });
    }
    return 1;
  }
};

/**
 * Register the 'validate' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerValidateCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("validate")
    .description("Validate a build manifest against the schema")
    .argument(
      "[manifest]",
      "Manifest path",
      getManifestPath({ namespace: DEFAULT_NAMESPACE }),
    )
    .action(async (manifest: string) => {
      const exitCode = await runValidate({
        manifestPath: normalizePath({ value: manifest }),
      });
      process.exit(exitCode);
    });
};
