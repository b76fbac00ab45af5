/**
 * Build manifest construction and validation
 *
 * Manifests are immutable values: every builder call returns a new manifest
 * and leaves its input untouched, so calls compose functionally.
 */

import * as fs from "fs/promises";
import * as path from "path";

import semver from "semver";

import { ManifestReadError, SchemaViolationError, describeCause } from "@/cli/errors.js";
import {
  MANIFEST_SCHEMA_VERSION,
  formatSchemaError,
  validateManifestSchema,
} from "@/cli/features/manifest/schema.js";
import { isFingerprint } from "@/cli/features/versioning/fingerprint.js";

import type { BuildManifest, JsonObject, JsonValue } from "./types.js";
import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";

const HOOK_NAME_REGEX = /^[a-zA-Z0-9_-]+$/;

export const MANIFEST_FILE_NAME = "build-manifest.json";

/**
 * Get the default path of the manifest inside the image
 * @param args - Configuration arguments
 * @param args.namespace - Image namespace directory under /etc
 *
 * @returns /etc/<namespace>/build-manifest.json
 */
export const getManifestPath = (args: { namespace: string }): string => {
  const { namespace } = args;
  return path.posix.join("/etc", namespace, MANIFEST_FILE_NAME);
};

/**
 * Format a date as ISO-8601 UTC with second precision
 * @param date - Date to format
 *
 * @returns Timestamp such as 2025-10-10T12:00:00Z
 */
export const formatBuildDate = (date: Date): string => {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
};

/**
 * Check whether a value is a JSON value
 * @param value - Value to check
 *
 * @returns True if value survives JSON serialization unchanged in shape
 */
const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isJsonObject(value);
    default:
      return false;
  }
};

/**
 * Check whether a value is a plain JSON object
 * @param value - Value to check
 *
 * @returns True if value is a non-array object whose values are JSON values
 */
export const isJsonObject = (value: unknown): value is JsonObject => {
  if (value == null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
};

/**
 * Create a new manifest with build metadata and no hooks
 * @param args - Build metadata
 * @param args.image - Full OCI image reference with tag
 * @param args.base - Base image reference
 * @param args.commit - Short commit SHA or "unknown"
 * @param args.now - Build time (defaults to the current time)
 *
 * @throws SchemaViolationError if any reference is empty
 *
 * @returns New manifest
 */
export const newManifest = (args: {
  image: string;
  base: string;
  commit: string;
  now?: Date | null;
}): BuildManifest => {
  const { image, base, commit, now } = args;

  for (const [field, value] of [
    ["build.image", image],
    ["build.base", base],
    ["build.commit", commit],
  ] as const) {
    if (value.trim() === "") {
      throw new SchemaViolationError({ field, message: "must not be empty" });
    }
  }

  return {
    version: MANIFEST_SCHEMA_VERSION,
    build: {
      date: formatBuildDate(now ?? new Date()),
      image,
      base,
      commit,
    },
    hooks: {},
  };
};

/**
 * Add or replace a hook entry
 * @param args - Hook arguments
 * @param args.manifest - Manifest to extend (not mutated)
 * @param args.name - Hook identifier
 * @param args.fingerprint - Content fingerprint of the hook's dependencies
 * @param args.dependencies - Repository-relative paths that were hashed
 * @param args.metadata - Hook-specific metadata (defaults to {})
 *
 * @throws SchemaViolationError naming the first invalid argument
 *
 * @returns A new manifest containing the hook; last write wins on a repeated name
 */
export const addHook = (args: {
  manifest: BuildManifest;
  name: string;
  fingerprint: ContentFingerprint;
  dependencies: ReadonlyArray<string>;
  metadata?: unknown;
}): BuildManifest => {
  const { manifest, name, fingerprint, dependencies, metadata } = args;

  if (!HOOK_NAME_REGEX.test(name)) {
    throw new SchemaViolationError({
      field: "hook name",
      message: `'${name}' must match ${HOOK_NAME_REGEX.source}`,
    });
  }
  if (!isFingerprint(fingerprint)) {
    throw new SchemaViolationError({
      field: `hooks.${name}.version`,
      message: `'${fingerprint}' (expected 8 lowercase hex characters)`,
    });
  }
  if (dependencies.length === 0) {
    throw new SchemaViolationError({
      field: `hooks.${name}.dependencies`,
      message: "must contain at least one path",
    });
  }
  if (dependencies.some((dependency) => dependency === "")) {
    throw new SchemaViolationError({
      field: `hooks.${name}.dependencies`,
      message: "paths must not be empty",
    });
  }
  const resolvedMetadata = metadata === undefined ? {} : metadata;
  if (!isJsonObject(resolvedMetadata)) {
    throw new SchemaViolationError({
      field: `hooks.${name}.metadata`,
      message: "must be a JSON object",
    });
  }

  return {
    ...manifest,
    build: { ...manifest.build },
    hooks: {
      ...manifest.hooks,
      [name]: {
        version: fingerprint,
        dependencies: [...dependencies],
        metadata: structuredClone(resolvedMetadata),
      },
    },
  };
};

/**
 * Validate a manifest against the schema
 * Reports every violation rather than stopping at the first.
 *
 * @param args - Validation arguments
 * @param args.manifest - Candidate manifest (any parsed JSON)
 *
 * @returns Human-readable violations; empty when valid
 */
export const validateManifest = (args: { manifest: unknown }): Array<string> => {
  const { manifest } = args;

  if (validateManifestSchema(manifest)) {
    return [];
  }

  const violations = (validateManifestSchema.errors ?? [])
    // propertyNames failures are reported once by the propertyNames keyword
    .filter((err) => err.propertyName == null)
    .map(formatSchemaError);

  return [...new Set(violations)];
};

/**
 * Narrow a validated value to a manifest
 * @param value - Parsed JSON
 *
 * @returns True if value is a valid manifest
 */
export const isBuildManifest = (value: unknown): value is BuildManifest => {
  return validateManifest({ manifest: value }).length === 0;
};

/**
 * Load a manifest from disk
 * @param args - Load arguments
 * @param args.manifestPath - Path to build-manifest.json
 *
 * @throws ManifestReadError if the file is unreadable, not JSON, invalid, or
 *   of an unsupported major schema version
 *
 * @returns The manifest, or null if the file does not exist
 */
export const loadManifest = async (args: {
  manifestPath: string;
}): Promise<BuildManifest | null> => {
  const { manifestPath } = args;

  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new ManifestReadError({
      path: manifestPath,
      message: `Unable to read manifest (${describeCause(err)})`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ManifestReadError({
      path: manifestPath,
      message: `Manifest contains invalid JSON (${describeCause(err)})`,
    });
  }

  if (!isBuildManifest(parsed)) {
    throw new ManifestReadError({
      path: manifestPath,
      message: "Manifest failed schema validation",
      violations: validateManifest({ manifest: parsed }),
    });
  }

  const schemaVersion = semver.parse(parsed.version);
  if (
    schemaVersion == null ||
    schemaVersion.major !== semver.major(MANIFEST_SCHEMA_VERSION)
  ) {
    throw new ManifestReadError({
      path: manifestPath,
      message: `Unsupported manifest schema version ${parsed.version}`,
    });
  }

  return parsed;
};
