/**
 * Types for first-boot hook definitions
 */

import type { JsonObject } from "@/cli/features/manifest/types.js";

/**
 * Declarative description of one versioned hook
 *
 * Adding a hook means adding one of these to the hook table; the hasher,
 * builder and writer never change.
 */
export type HookDefinition = {
  /** Hook identifier, unique within a manifest */
  name: string;
  /** Repository-relative path of the hook script */
  script: string;
  /** Glob (relative to the repository root) of extra data files to hash */
  extraDependencyGlob?: string | null;
  /**
   * Derive hook-specific metadata from the resolved extra dependencies
   * The `changed` key is owned by the generator and overwritten.
   */
  extractMetadata?:
    | ((args: {
        repoRoot: string;
        extraDependencies: ReadonlyArray<string>;
      }) => Promise<JsonObject>)
    | null;
};
