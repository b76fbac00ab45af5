/**
 * Manifest generator
 *
 * Fingerprints every hook of the hook table, assembles and validates the
 * manifest, writes it, and hands the fingerprints back to the embedding build
 * so it can stamp them into the hook scripts.
 */

import * as path from "path";

import { glob } from "glob";

import { ValidationErrors } from "@/cli/errors.js";
import {
  addHook,
  newManifest,
  validateManifest,
} from "@/cli/features/manifest/manifest.js";
import { writeManifest } from "@/cli/features/manifest/writer.js";
import {
  computeFingerprint,
  sortPathsBytewise,
} from "@/cli/features/versioning/fingerprint.js";
import { info, debug } from "@/cli/logger.js";

import type { BuildManifest } from "./types.js";
import type { BuildContext } from "@/cli/config.js";
import type { HookDefinition } from "@/cli/features/hooks/types.js";
import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";

/**
 * Resolve the repository-relative dependency set of a hook
 * @param args - Resolve arguments
 * @param args.repoRoot - Repository root
 * @param args.hook - Hook definition
 *
 * @returns The sorted dependency paths and the extra (non-script) ones
 */
export const resolveHookDependencies = async (args: {
  repoRoot: string;
  hook: HookDefinition;
}): Promise<{ dependencies: Array<string>; extraDependencies: Array<string> }> => {
  const { repoRoot, hook } = args;

  const extraDependencies =
    hook.extraDependencyGlob == null
      ? []
      : sortPathsBytewise(
          await glob(hook.extraDependencyGlob, {
            cwd: repoRoot,
            nodir: true,
            dot: true,
            posix: true,
          }),
        );

  return {
    dependencies: sortPathsBytewise([hook.script, ...extraDependencies]),
    extraDependencies,
  };
};

/**
 * Decide whether a hook's fingerprint differs from the previous build
 * @param args - Comparison arguments
 * @param args.previousManifest - Manifest of the previous build, if known
 * @param args.name - Hook name
 * @param args.fingerprint - Fingerprint computed for this build
 *
 * @returns True unless the previous manifest records the same fingerprint
 */
export const hasHookChanged = (args: {
  previousManifest?: BuildManifest | null;
  name: string;
  fingerprint: ContentFingerprint;
}): boolean => {
  const { previousManifest, name, fingerprint } = args;
  const previous = previousManifest?.hooks[name];
  return previous == null || previous.version !== fingerprint;
};

/**
 * Build the manifest for a set of hooks without writing it
 * @param args - Build arguments
 * @param args.hooks - Hook table
 * @param args.context - Build context
 * @param args.previousManifest - Manifest of the previous build for change detection
 * @param args.now - Build time override
 *
 * @throws MissingFileError, SchemaViolationError or ValidationErrors; any
 *   failure aborts the whole build
 *
 * @returns The validated manifest
 */
export const buildManifest = async (args: {
  hooks: ReadonlyArray<HookDefinition>;
  context: BuildContext;
  previousManifest?: BuildManifest | null;
  now?: Date | null;
}): Promise<BuildManifest> => {
  const { hooks, context, previousManifest, now } = args;
  const { repoRoot } = context;

  let manifest = newManifest({
    image: context.image,
    base: context.base,
    commit: context.commit,
    now,
  });

  for (const hook of hooks) {
    info({ message: `Computing fingerprint for ${hook.name} hook...` });

    const { dependencies, extraDependencies } = await resolveHookDependencies({
      repoRoot,
      hook,
    });
    const fingerprint = await computeFingerprint({
      paths: dependencies.map((dependency) => path.join(repoRoot, dependency)),
    });
    const extracted =
      hook.extractMetadata == null
        ? {}
        : await hook.extractMetadata({ repoRoot, extraDependencies });
    const changed = hasHookChanged({
      previousManifest,
      name: hook.name,
      fingerprint,
    });

    manifest = addHook({
      manifest,
      name: hook.name,
      fingerprint,
      dependencies,
      metadata: { ...extracted, changed },
    });

    info({
      message: `  Version: ${fingerprint} (${dependencies.length} file(s)${
        changed ? ", changed" : ""
      })`,
    });
    debug({ message: `  Dependencies: ${dependencies.join(", ")}` });
  }

  const violations = validateManifest({ manifest });
  if (violations.length > 0) {
    throw new ValidationErrors({ violations });
  }

  return manifest;
};

/**
 * Generate, validate and write the build manifest
 * @param args - Generation arguments
 * @param args.hooks - Hook table
 * @param args.context - Build context
 * @param args.outputPath - Where to write the manifest
 * @param args.previousManifest - Manifest of the previous build for change detection
 * @param args.now - Build time override
 *
 * @returns Map of hook name -> fingerprint for placeholder substitution
 */
export const generate = async (args: {
  hooks: ReadonlyArray<HookDefinition>;
  context: BuildContext;
  outputPath: string;
  previousManifest?: BuildManifest | null;
  now?: Date | null;
}): Promise<Record<string, ContentFingerprint>> => {
  const { outputPath } = args;

  const manifest = await buildManifest(args);
  await writeManifest({ manifest, outputPath });

  return Object.fromEntries(
    Object.entries(manifest.hooks).map(([name, hook]) => [name, hook.version]),
  );
};

/**
 * Render fingerprints as shell-style assignments
 * @param args - Render arguments
 * @param args.fingerprints - Map of hook name -> fingerprint
 *
 * @returns Lines such as VSCODE_EXTENSIONS_VERSION=1c4e9f2a
 */
export const fingerprintEnvLines = (args: {
  fingerprints: Record<string, ContentFingerprint>;
}): Array<string> => {
  const { fingerprints } = args;
  return Object.entries(fingerprints).map(([name, fingerprint]) => {
    const key = name.toUpperCase().replace(/[^A-Z0-9]/g, "_");
    return `${key}_VERSION=${fingerprint}`;
  });
};
