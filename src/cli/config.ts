/**
 * Configuration management for hookstamp
 * Loads hookstamp.config.json and resolves the build context handed to the
 * manifest generator. Nothing downstream reads process.env directly.
 */

import { execSync } from "child_process";
import * as fs from "fs/promises";
import * as path from "path";

import ajvModule from "ajv";

import { ConfigError, describeCause } from "@/cli/errors.js";
import { HOOK_NAME_PATTERN } from "@/cli/features/manifest/schema.js";
import { getManifestPath } from "@/cli/features/manifest/manifest.js";

import type { HookDefinition } from "@/cli/features/hooks/types.js";

const Ajv = ajvModule.default;

export const CONFIG_FILE_NAME = "hookstamp.config.json";

export const DEFAULT_NAMESPACE = "hookstamp";
export const DEFAULT_IMAGE = "localhost/custom-image:latest";
export const DEFAULT_BASE_IMAGE = "ghcr.io/ublue-os/bluefin-dx:stable";
export const UNKNOWN_COMMIT = "unknown";

/**
 * Extra hook declared in the config file
 */
export type ConfigHook = {
  name: string;
  script: string;
  extraDependencyGlob?: string | null;
};

/**
 * On-disk configuration (hookstamp.config.json)
 */
export type Config = {
  namespace?: string | null;
  image?: string | null;
  base?: string | null;
  output?: string | null;
  hooks?: Array<ConfigHook> | null;
};

/**
 * Explicit build context passed into the generator
 */
export type BuildContext = {
  /** Absolute repository root that dependency paths are relative to */
  repoRoot: string;
  image: string;
  base: string;
  commit: string;
};

/**
 * Everything a generate run needs
 */
export type ResolvedSettings = {
  context: BuildContext;
  outputPath: string;
  extraHooks: Array<HookDefinition>;
};

// JSON schema for hookstamp.config.json
const configSchema = {
  type: "object",
  properties: {
    namespace: { type: "string", pattern: HOOK_NAME_PATTERN },
    image: { type: "string", minLength: 1 },
    base: { type: "string", minLength: 1 },
    output: { type: "string", minLength: 1 },
    hooks: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "script"],
        properties: {
          name: { type: "string", pattern: HOOK_NAME_PATTERN },
          script: { type: "string", minLength: 1 },
          extraDependencyGlob: { type: "string", minLength: 1 },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });

const validateConfigSchema = ajv.compile<Config>(configSchema);

/**
 * Get the path to the config file
 * @param args - Configuration arguments
 * @param args.repoRoot - Repository root
 *
 * @returns The absolute path to hookstamp.config.json
 */
export const getConfigPath = (args: { repoRoot: string }): string => {
  const { repoRoot } = args;
  return path.join(repoRoot, CONFIG_FILE_NAME);
};

/**
 * Load configuration from disk
 * @param args - Configuration arguments
 * @param args.repoRoot - Repository root
 *
 * @throws ConfigError if the file exists but is unreadable or invalid
 *
 * @returns The config, or null if there is no config file
 */
export const loadConfig = async (args: {
  repoRoot: string;
}): Promise<Config | null> => {
  const { repoRoot } = args;
  const configPath = getConfigPath({ repoRoot });

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new ConfigError({
      path: configPath,
      message: `Unable to read ${CONFIG_FILE_NAME} (${describeCause(err)})`,
    });
  }

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch (err) {
    throw new ConfigError({
      path: configPath,
      message: `Invalid JSON in ${CONFIG_FILE_NAME} (${describeCause(err)})`,
    });
  }

  if (!validateConfigSchema(rawConfig)) {
    const errors = (validateConfigSchema.errors ?? []).map((err) => {
      const at = err.instancePath || "(root)";
      return `Config validation error at ${at}: ${err.message ?? "unknown error"}`;
    });
    throw new ConfigError({
      path: configPath,
      message: `${CONFIG_FILE_NAME} has validation errors`,
      violations: errors,
    });
  }

  return rawConfig;
};

/**
 * Read the short commit SHA of a repository
 * @param args - Configuration arguments
 * @param args.repoRoot - Repository root
 *
 * @returns 7-character SHA, or "unknown" outside a git checkout
 */
export const readGitCommit = (args: { repoRoot: string }): string => {
  const { repoRoot } = args;
  try {
    const sha = execSync("git rev-parse --short=7 HEAD", {
      cwd: repoRoot,
      stdio: ["ignore", "pipe", "ignore"],
      encoding: "utf-8",
    }).trim();
    return sha === "" ? UNKNOWN_COMMIT : sha;
  } catch {
    return UNKNOWN_COMMIT;
  }
};

/**
 * Pick the first non-empty value
 * @param values - Candidates in precedence order
 *
 * @returns The first value that is neither null nor blank
 */
const firstSet = (
  ...values: Array<string | null | undefined>
): string | null => {
  for (const value of values) {
    if (value != null && value.trim() !== "") {
      return value;
    }
  }
  return null;
};

/**
 * Resolve the settings of a generate run
 * Precedence: CLI option > environment > config file > default.
 *
 * @param args - Resolution arguments
 * @param args.repoRoot - Absolute repository root
 * @param args.options - Values given on the command line
 * @param args.env - Environment (IMAGE_NAME, BASE_IMAGE, GIT_COMMIT, MANIFEST_OUTPUT)
 * @param args.config - Loaded config file, if any
 * @param args.readCommit - Fallback commit lookup (defaults to git)
 *
 * @returns The build context, output path and extra hooks
 */
export const resolveSettings = (args: {
  repoRoot: string;
  options?: {
    image?: string | null;
    base?: string | null;
    commit?: string | null;
    output?: string | null;
  } | null;
  env?: Record<string, string | undefined> | null;
  config?: Config | null;
  readCommit?: ((args: { repoRoot: string }) => string) | null;
}): ResolvedSettings => {
  const { repoRoot } = args;
  const options = args.options ?? {};
  const env = args.env ?? {};
  const config = args.config ?? {};
  const readCommit = args.readCommit ?? readGitCommit;

  const namespace = firstSet(config.namespace) ?? DEFAULT_NAMESPACE;

  const envCommit = env.GIT_COMMIT === UNKNOWN_COMMIT ? null : env.GIT_COMMIT;
  const commit =
    firstSet(options.commit, envCommit) ?? readCommit({ repoRoot });

  const output =
    firstSet(options.output, env.MANIFEST_OUTPUT, config.output) ??
    getManifestPath({ namespace });

  return {
    context: {
      repoRoot,
      image: firstSet(options.image, env.IMAGE_NAME, config.image) ?? DEFAULT_IMAGE,
      base:
        firstSet(options.base, env.BASE_IMAGE, config.base) ?? DEFAULT_BASE_IMAGE,
      commit,
    },
    outputPath: path.resolve(repoRoot, output),
    extraHooks: (config.hooks ?? []).map((hook) => ({
      name: hook.name,
      script: hook.script,
      extraDependencyGlob: hook.extraDependencyGlob ?? null,
    })),
  };
};
