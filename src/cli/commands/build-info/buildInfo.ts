/**
 * Build Info Command
 *
 * Read-only view of the build manifest for end users.
 */

import { DEFAULT_NAMESPACE } from "@/cli/config.js";
import { formatError } from "@/cli/errors.js";
import {
  getManifestPath,
  loadManifest,
  MANIFEST_FILE_NAME,
} from "@/cli/features/manifest/manifest.js";
import { serializeManifest } from "@/cli/features/manifest/writer.js";
import { boldWhite, error, raw } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type { BuildManifest } from "@/cli/features/manifest/types.js";
import type { Command } from "commander";

/**
 * Format the manifest as a human-readable summary
 * @param args - Format arguments
 * @param args.manifest - Manifest to display
 *
 * @returns Summary text, hooks sorted by name
 */
export const formatBuildInfo = (args: { manifest: BuildManifest }): string => {
  const { manifest } = args;
  const { build } = manifest;

  const lines: Array<string> = [
    boldWhite("Build Information:"),
    `  Date:   ${build.date}`,
    `  Image:  ${build.image}`,
    `  Base:   ${build.base}`,
    `  Commit: ${build.commit}`,
    "",
    boldWhite("Content Versions:"),
  ];

  for (const name of Object.keys(manifest.hooks).sort()) {
    const hook = manifest.hooks[name];
    const metadata = hook.metadata ?? {};

    let extra = "";
    if (typeof metadata.wallpaper_count === "number") {
      extra = ` (${metadata.wallpaper_count} wallpapers)`;
    } else if (typeof metadata.extension_count === "number") {
      extra = ` (${metadata.extension_count} extensions)`;
    }
    const changed = metadata.changed === true ? " [changed]" : "";

    lines.push(
      `  ${`${name}:`.padEnd(20)} ${hook.version} (${hook.dependencies.length} dependencies)${extra}${changed}`,
    );
  }

  lines.push("", "For raw JSON output, use: hookstamp build-info --json");
  return lines.join("\n");
};

/**
 * Display the build manifest
 * @param args - Display arguments
 * @param args.manifestPath - Manifest path
 * @param args.json - Print the raw manifest instead of the summary
 *
 * @returns Process exit code: 1 when the manifest is absent or unparseable
 */
export const runBuildInfo = async (args: {
  manifestPath: string;
  json: boolean;
}): Promise<number> => {
  const { manifestPath, json } = args;

  let manifest: BuildManifest | null;
  try {
    manifest = await loadManifest({ manifestPath });
  } catch (err) {
    for (const line of formatError(err)) {
      error({ message: line });
    }
    return 1;
  }

  if (manifest == null) {
    error({ message: `Build manifest not found at ${manifestPath}` });
    error({ message: "This may indicate a build issue or development environment." });
    return 1;
  }

  raw({
    message: json
      ? serializeManifest(manifest).trimEnd()
      : formatBuildInfo({ manifest }),
  });
  return 0;
};

/**
 * Register the 'build-info' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerBuildInfoCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("build-info")
    .description(`Display build information from ${MANIFEST_FILE_NAME}`)
    .option("-j, --json", "Output raw JSON manifest")
    .option(
      "-m, --manifest <path>",
      "Manifest path",
      getManifestPath({ namespace: DEFAULT_NAMESPACE }),
    )
    .action(async (options: { json?: boolean; manifest: string }) => {
      const exitCode = await runBuildInfo({
        manifestPath: normalizePath({ value: options.manifest }),
        json: options.json === true,
      });
      process.exit(exitCode);
    });
};
