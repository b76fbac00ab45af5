/**
 * Known first-boot hooks
 * The single place that knows which hooks exist and what each one depends on.
 */

import * as fs from "fs/promises";
import * as path from "path";

import type { HookDefinition } from "./types.js";

/**
 * Count entries of a line-oriented list file, ignoring blanks and # comments
 * @param content - File content
 *
 * @returns Number of entries
 */
export const countListEntries = (content: string): number => {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#")).length;
};

export const KNOWN_HOOKS: ReadonlyArray<HookDefinition> = [
  {
    name: "wallpaper",
    script: "build_files/user-hooks/10-wallpaper-enforcement.sh",
    extraDependencyGlob: "custom_wallpapers/*",
    extractMetadata: async ({ extraDependencies }) => ({
      wallpaper_count: extraDependencies.length,
    }),
  },
  {
    name: "vscode-extensions",
    script: "build_files/user-hooks/20-vscode-extensions.sh",
    extraDependencyGlob: "vscode-extensions.list",
    extractMetadata: async ({ repoRoot, extraDependencies }) => {
      let extensionCount = 0;
      for (const listFile of extraDependencies) {
        const content = await fs.readFile(path.join(repoRoot, listFile), "utf-8");
        extensionCount += countListEntries(content);
      }
      return { extension_count: extensionCount };
    },
  },
  {
    name: "holotree-init",
    script: "build_files/user-hooks/30-holotree-init.sh",
  },
  {
    name: "welcome",
    script: "build_files/user-hooks/99-first-boot-welcome.sh",
  },
];

/**
 * Merge extra hook definitions into a base table
 * An extra hook with the name of an existing one replaces it in place.
 *
 * @param args - Merge arguments
 * @param args.base - Base hook table
 * @param args.extra - Additional hook definitions
 *
 * @returns Combined hook table
 */
export const mergeHookTables = (args: {
  base: ReadonlyArray<HookDefinition>;
  extra: ReadonlyArray<HookDefinition>;
}): Array<HookDefinition> => {
  const { base, extra } = args;
  const merged = new Map<string, HookDefinition>();
  for (const hook of [...base, ...extra]) {
    merged.set(hook.name, hook);
  }
  return Array.from(merged.values());
};
