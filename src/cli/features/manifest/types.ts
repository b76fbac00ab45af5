/**
 * Types for the build manifest
 *
 * The manifest records build metadata and the content fingerprint of every
 * first-boot hook. It is written once per image build to
 * /etc/<namespace>/build-manifest.json and only read afterwards.
 */

import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | Array<JsonValue>
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Fingerprint entry for one hook
 */
export type HookDescriptor = {
  /** Content fingerprint of the hook's dependency set */
  version: ContentFingerprint;
  /** Repository-relative paths that were hashed, sorted */
  dependencies: Array<string>;
  /** Hook-specific metadata (counts, changed flag); optional on disk */
  metadata?: JsonObject;
};

/**
 * Build metadata stamped when the manifest is created
 */
export type BuildInfo = {
  /** ISO-8601 UTC timestamp, second precision */
  date: string;
  /** Full OCI reference of the image being built */
  image: string;
  /** Base image reference */
  base: string;
  /** Short commit SHA, or "unknown" */
  commit: string;
};

/**
 * Manifest file structure
 */
export type BuildManifest = {
  /** Schema version (semver) */
  version: string;
  build: BuildInfo;
  /** Map of hook name -> HookDescriptor */
  hooks: Record<string, HookDescriptor>;
};
