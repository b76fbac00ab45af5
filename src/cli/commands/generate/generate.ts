/**
 * Generate Command
 *
 * Computes hook fingerprints, writes the build manifest and prints
 * NAME_VERSION=<fingerprint> lines on stdout for the embedding build.
 */

import { loadConfig, resolveSettings } from "@/cli/config.js";
import { formatError } from "@/cli/errors.js";
import { KNOWN_HOOKS, mergeHookTables } from "@/cli/features/hooks/registry.js";
import {
  fingerprintEnvLines,
  generate,
} from "@/cli/features/manifest/generator.js";
import { loadManifest } from "@/cli/features/manifest/manifest.js";
import { error, info, newline, raw, success, warn } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type { BuildManifest } from "@/cli/features/manifest/types.js";
import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";
import type { Command } from "commander";

export type GenerateOptions = {
  repoRoot?: string | null;
  output?: string | null;
  previous?: string | null;
  image?: string | null;
  base?: string | null;
  commit?: string | null;
};

/**
 * Load the manifest of the previous build
 * An explicit --previous must be valid. The manifest already at the output
 * path is only a best guess, so an unusable one is reported and ignored.
 *
 * @param args - Load arguments
 * @param args.previousPath - Explicit previous manifest path
 * @param args.outputPath - Output path of this build
 *
 * @returns The previous manifest, or null
 */
const loadPreviousManifest = async (args: {
  previousPath: string | null;
  outputPath: string;
}): Promise<BuildManifest | null> => {
  const { previousPath, outputPath } = args;

  if (previousPath != null) {
    return loadManifest({ manifestPath: previousPath });
  }

  try {
    return await loadManifest({ manifestPath: outputPath });
  } catch (err) {
    for (const line of formatError(err)) {
      warn({ message: line });
    }
    warn({ message: "Ignoring existing manifest; every hook is marked changed" });
    return null;
  }
};

/**
 * Run manifest generation
 * @param args - Generation arguments
 * @param args.options - Command-line options
 * @param args.env - Environment variables
 *
 * @returns Map of hook name -> fingerprint
 */
export const main = async (args: {
  options: GenerateOptions;
  env: Record<string, string | undefined>;
}): Promise<Record<string, ContentFingerprint>> => {
  const { options, env } = args;
  const repoRoot = normalizePath({ value: options.repoRoot });

  const config = await loadConfig({ repoRoot });
  const { context, outputPath, extraHooks } = resolveSettings({
    repoRoot,
    options: {
      ...options,
      output:
        options.output == null ? null : normalizePath({ value: options.output }),
    },
    env,
    config,
  });

  info({ message: "Build Manifest Generation" });
  info({ message: `Image:  ${context.image}` });
  info({ message: `Base:   ${context.base}` });
  info({ message: `Commit: ${context.commit}` });
  newline();

  const previousManifest = await loadPreviousManifest({
    previousPath:
      options.previous == null
        ? null
        : normalizePath({ value: options.previous }),
    outputPath,
  });

  const fingerprints = await generate({
    hooks: mergeHookTables({ base: KNOWN_HOOKS, extra: extraHooks }),
    context,
    outputPath,
    previousManifest,
  });

  success({ message: "✓ Build manifest generation complete" });
  return fingerprints;
};

/**
 * Register the 'generate' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerGenerateCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("generate")
    .description("Fingerprint all hooks and write the build manifest")
    .option("-r, --repo-root <path>", "Repository root (default: cwd)")
    .option(
      "-o, --output <path>",
      "Manifest output path (default: /etc/<namespace>/build-manifest.json)",
    )
    .option(
      "-p, --previous <path>",
      "Previous build's manifest for change detection (default: the output path)",
    )
    .option("--image <ref>", "Image reference (env: IMAGE_NAME)")
    .option("--base <ref>", "Base image reference (env: BASE_IMAGE)")
    .option("--commit <sha>", "Commit SHA (env: GIT_COMMIT)")
    .action(async (options: GenerateOptions) => {
      try {
        const fingerprints = await main({ options, env: process.env });
        for (const line of fingerprintEnvLines({ fingerprints })) {
          raw({ message: line });
        }
      } catch (err) {
        for (const line of formatError(err)) {
          error({ message: line });
        }
        process.exit(1);
      }
    });
};
