/**
 * Version-tracking store
 *
 * The store belongs to the host's first-boot setup runtime; the gate only
 * talks to it through `VersionStore`. The file adapter reads and writes the
 * Universal Blue setup_versioning.json layout:
 *
 *   { "version": { "user": { "<hookName>": "<fingerprint>" } } }
 *
 * Keys other than version.user.<hookName> are preserved untouched.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describeCause } from "@/cli/errors.js";
import { warn } from "@/cli/logger.js";

import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";

/**
 * Last successfully applied fingerprint per hook
 */
export type VersionStore = {
  lastKnownFingerprint: (args: {
    hookName: string;
  }) => Promise<ContentFingerprint | null>;
  recordFingerprint: (args: {
    hookName: string;
    fingerprint: ContentFingerprint;
  }) => Promise<void>;
};

type StoreDocument = { [key: string]: unknown };

/**
 * Get the default store path for the current user
 * @returns ~/.local/share/ublue/setup_versioning.json
 */
export const getDefaultStorePath = (): string => {
  return path.join(os.homedir(), ".local", "share", "ublue", "setup_versioning.json");
};

const isRecord = (value: unknown): value is StoreDocument => {
  return value != null && typeof value === "object" && !Array.isArray(value);
};

/**
 * Read the store document
 * @param filePath - Store path
 *
 * @returns The parsed document, or an empty one if the file is absent or
 *   unparseable (every hook then runs and the next record rewrites the file)
 */
const readDocument = async (filePath: string): Promise<StoreDocument> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    warn({
      message: `⚠️  Ignoring unparseable version store ${filePath} (${describeCause(err)})`,
    });
    return {};
  }
  if (!isRecord(parsed)) {
    warn({
      message: `⚠️  Ignoring version store ${filePath}: not a JSON object`,
    });
    return {};
  }
  return parsed;
};

/**
 * Create a store backed by a JSON file
 * @param args - Store arguments
 * @param args.filePath - Path of setup_versioning.json
 *
 * @returns File-backed version store
 */
export const createFileVersionStore = (args: {
  filePath: string;
}): VersionStore => {
  const { filePath } = args;

  return {
    lastKnownFingerprint: async ({ hookName }) => {
      const document = await readDocument(filePath);
      const version = document.version;
      if (!isRecord(version) || !isRecord(version.user)) {
        return null;
      }
      const recorded = version.user[hookName];
      return typeof recorded === "string" ? recorded : null;
    },

    recordFingerprint: async ({ hookName, fingerprint }) => {
      const document = await readDocument(filePath);
      const version = isRecord(document.version) ? document.version : {};
      const user = isRecord(version.user) ? version.user : {};

      const updated: StoreDocument = {
        ...document,
        version: { ...version, user: { ...user, [hookName]: fingerprint } },
      };

      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, `${JSON.stringify(updated, null, 2)}\n`);
      try {
        await fs.rename(tempPath, filePath);
      } catch (err) {
        await fs.rm(tempPath, { force: true });
        throw err;
      }
    },
  };
};
