/**
 * Hook script templating
 * Bakes a fingerprint into a hook script by replacing every
 * __CONTENT_VERSION__ token.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { SchemaViolationError } from "@/cli/errors.js";
import { isFingerprint } from "@/cli/features/versioning/fingerprint.js";
import { success, warn } from "@/cli/logger.js";

import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";

export const VERSION_PLACEHOLDER = "__CONTENT_VERSION__";

/**
 * Replace the version placeholder in script content
 * @param args - Stamp arguments
 * @param args.content - Script template
 * @param args.fingerprint - Fingerprint to inject
 *
 * @throws SchemaViolationError if the fingerprint is malformed
 *
 * @returns The stamped content and how many placeholders were replaced
 */
export const stampPlaceholder = (args: {
  content: string;
  fingerprint: ContentFingerprint;
}): { content: string; replacements: number } => {
  const { content, fingerprint } = args;

  if (!isFingerprint(fingerprint)) {
    throw new SchemaViolationError({
      field: "fingerprint",
      message: `'${fingerprint}' (expected 8 lowercase hex characters)`,
    });
  }

  const parts = content.split(VERSION_PLACEHOLDER);
  return {
    content: parts.join(fingerprint),
    replacements: parts.length - 1,
  };
};

/**
 * Stamp a hook script in place
 * The file is rewritten through a temp file and keeps its permissions.
 *
 * @param args - Stamp arguments
 * @param args.filePath - Script to rewrite
 * @param args.fingerprint - Fingerprint to inject
 *
 * @returns Number of placeholders replaced; 0 leaves the file untouched
 */
export const stampHookScript = async (args: {
  filePath: string;
  fingerprint: ContentFingerprint;
}): Promise<number> => {
  const { filePath, fingerprint } = args;

  const original = await fs.readFile(filePath, "utf-8");
  const { content, replacements } = stampPlaceholder({
    content: original,
    fingerprint,
  });

  if (replacements === 0) {
    warn({
      message: `⚠️  No ${VERSION_PLACEHOLDER} placeholder found in ${filePath}`,
    });
    return 0;
  }

  const { mode } = await fs.stat(filePath);
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  try {
    await fs.writeFile(tempPath, content);
    await fs.chmod(tempPath, mode & 0o7777);
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }

  success({
    message: `✓ Replaced version placeholder in ${filePath} with ${fingerprint}`,
  });
  return replacements;
};
