/**
 * Stamp Command
 *
 * Substitutes a hook's fingerprint from the manifest into its script files.
 */

import { DEFAULT_NAMESPACE } from "@/cli/config.js";
import { formatError } from "@/cli/errors.js";
import { stampHookScript } from "@/cli/features/hooks/template.js";
import { getManifestPath, loadManifest } from "@/cli/features/manifest/manifest.js";
import { error } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type { Command } from "commander";

/**
 * Stamp hook scripts with the fingerprint recorded for a hook
 * @param args - Stamp arguments
 * @param args.manifestPath - Manifest holding the fingerprint
 * @param args.hookName - Hook whose fingerprint to use
 * @param args.files - Scripts to rewrite in place
 *
 * @returns Process exit code
 */
export const runStamp = async (args: {
  manifestPath: string;
  hookName: string;
  files: ReadonlyArray<string>;
}): Promise<number> => {
  const { manifestPath, hookName, files } = args;

  try {
    const manifest = await loadManifest({ manifestPath });
    if (manifest == null) {
      error({ message: `Build manifest not found at ${manifestPath}` });
      return 1;
    }

    const hook = manifest.hooks[hookName];
    if (hook == null) {
      error({ message: `Hook '${hookName}' is not in ${manifestPath}` });
      return 1;
    }

    for (const filePath of files) {
      await stampHookScript({ filePath, fingerprint: hook.version });
    }
    return 0;
  } catch (err) {
    for (const line of formatError(err)) {
      error({ message: line });
    }
    return 1;
  }
};

/**
 * Register the 'stamp' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerStampCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("stamp")
    .description("Replace __CONTENT_VERSION__ in hook scripts with the hook's fingerprint")
    .argument("<hook>", "Hook name in the manifest")
    .argument("<files...>", "Hook scripts to stamp in place")
    .option(
      "-m, --manifest <path>",
      "Manifest path",
      getManifestPath({ namespace: DEFAULT_NAMESPACE }),
    )
    .action(
      async (hook: string, files: Array<string>, options: { manifest: string }) => {
        const exitCode = await runStamp({
          manifestPath: normalizePath({ value: options.manifest }),
          hookName: hook,
          files: files.map((file) => normalizePath({ value: file })),
        });
        process.exit(exitCode);
      },
    );
};
