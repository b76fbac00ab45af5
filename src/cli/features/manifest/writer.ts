/**
 * Manifest writer
 * Persists a validated manifest with an atomic temp-file + rename so readers
 * never observe a partially written file.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { ValidationErrors, WriteError, describeCause } from "@/cli/errors.js";
import { validateManifest } from "@/cli/features/manifest/manifest.js";
import { debug, success, warn } from "@/cli/logger.js";

import type { BuildManifest } from "./types.js";

/** Manifests are baked into every image layer and should stay small */
export const MANIFEST_SIZE_WARNING_BYTES = 50 * 1024;

export const MANIFEST_FILE_MODE = 0o644;

/**
 * Serialize a manifest the way it is stored on disk
 * @param manifest - Manifest to serialize
 *
 * @returns Pretty-printed JSON with a trailing newline
 */
export const serializeManifest = (manifest: BuildManifest): string => {
  return `${JSON.stringify(manifest, null, 2)}\n`;
};

/**
 * Format a byte count for log output
 * @param bytes - Size in bytes
 *
 * @returns Size in KiB with one decimal
 */
const formatSize = (bytes: number): string => `${(bytes / 1024).toFixed(1)} KiB`;

/**
 * Remove a leftover temp file
 * A failed cleanup is only logged so the original WriteError reaches the caller.
 * @param args - Cleanup arguments
 * @param args.tempPath - Temp file to remove
 */
const removeTempFile = async (args: { tempPath: string }): Promise<void> => {
  const { tempPath } = args;
  await fs.rm(tempPath, { force: true }).catch((err: unknown) => {
    debug({ message: `Could not remove ${tempPath}: ${describeCause(err)}` });
  });
};

/**
 * Write a manifest to disk
 * @param args - Write arguments
 * @param args.manifest - Manifest to write
 * @param args.outputPath - Destination path
 *
 * @throws ValidationErrors if the manifest is invalid (nothing is written)
 * @throws WriteError if the directory, temp file or rename fails
 *
 * @returns The written path and its size in bytes
 */
export const writeManifest = async (args: {
  manifest: BuildManifest;
  outputPath: string;
}): Promise<{ outputPath: string; size: number }> => {
  const { manifest, outputPath } = args;

  const violations = validateManifest({ manifest });
  if (violations.length > 0) {
    throw new ValidationErrors({ violations });
  }

  const outputDir = path.dirname(outputPath);
  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new WriteError({
      kind: "directory-create-failed",
      path: outputDir,
      cause: err,
    });
  }

  const content = serializeManifest(manifest);
  const size = Buffer.byteLength(content, "utf-8");
  if (size > MANIFEST_SIZE_WARNING_BYTES) {
    warn({
      message: `⚠️  Manifest size exceeds 50 KiB (${formatSize(size)})`,
    });
  }

  const tempPath = path.join(
    outputDir,
    `.${path.basename(outputPath)}.${process.pid}.tmp`,
  );

  try {
    await fs.writeFile(tempPath, content, { mode: MANIFEST_FILE_MODE });
    // writeFile's mode is filtered through the umask
    await fs.chmod(tempPath, MANIFEST_FILE_MODE);
  } catch (err) {
    await removeTempFile({ tempPath });
    throw new WriteError({ kind: "write-failed", path: tempPath, cause: err });
  }

  try {
    await fs.rename(tempPath, outputPath);
  } catch (err) {
    await removeTempFile({ tempPath });
    throw new WriteError({ kind: "rename-failed", path: outputPath, cause: err });
  }

  success({ message: `✓ Manifest written to ${outputPath} (${formatSize(size)})` });

  return { outputPath, size };
};
