/**
 * Content fingerprints
 *
 * A fingerprint is the first 8 hex characters of the SHA-256 digest over the
 * concatenated bytes of a file set, taken in byte-wise sorted path order.
 * 32 bits is enough to tell apart the few hundred hand-curated hooks of one
 * build and short enough for log lines; it is not a security boundary.
 */

import * as crypto from "crypto";
import { constants, createReadStream } from "fs";
import * as fs from "fs/promises";

import { EmptyInputError, MissingFileError, describeCause } from "@/cli/errors.js";

export type ContentFingerprint = string;

export const FINGERPRINT_LENGTH = 8;

export const FINGERPRINT_PATTERN = /^[a-f0-9]{8}$/;

/**
 * Check a value against the fingerprint format
 * @param value - Value to check
 *
 * @returns True if value is exactly 8 lowercase hex characters
 */
export const isFingerprint = (value: unknown): value is ContentFingerprint => {
  return typeof value === "string" && FINGERPRINT_PATTERN.test(value);
};

/**
 * Sort paths by their UTF-8 bytes, independent of locale
 * @param paths - Paths to sort
 *
 * @returns A new sorted array without duplicates
 */
export const sortPathsBytewise = (
  paths: ReadonlyArray<string>,
): Array<string> => {
  return [...new Set(paths)].sort((a, b) =>
    Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8")),
  );
};

/**
 * Ensure a path is a readable regular file
 * @param filePath - Path to check
 */
const assertReadableFile = async (filePath: string): Promise<void> => {
  const stats = await fs.stat(filePath).catch((err: unknown) => {
    throw new MissingFileError({ path: filePath, reason: describeCause(err) });
  });
  if (!stats.isFile()) {
    throw new MissingFileError({ path: filePath, reason: "not a regular file" });
  }
  try {
    await fs.access(filePath, constants.R_OK);
  } catch (err) {
    throw new MissingFileError({ path: filePath, reason: describeCause(err) });
  }
};

/**
 * Compute the content fingerprint of a file set
 * Every path is checked before any byte is hashed, so a failure never yields
 * a partial result.
 *
 * @param args - Fingerprint arguments
 * @param args.paths - Files to hash, in any order
 *
 * @throws EmptyInputError if no paths are given
 * @throws MissingFileError naming the first path that is absent or unreadable
 *
 * @returns 8-character lowercase hex fingerprint
 */
export const computeFingerprint = async (args: {
  paths: ReadonlyArray<string>;
}): Promise<ContentFingerprint> => {
  const { paths } = args;

  if (paths.length === 0) {
    throw new EmptyInputError();
  }

  for (const filePath of paths) {
    await assertReadableFile(filePath);
  }

  const hash = crypto.createHash("sha256");
  for (const filePath of sortPathsBytewise(paths)) {
    try {
      for await (const chunk of createReadStream(filePath)) {
        hash.update(chunk);
      }
    } catch (err) {
      throw new MissingFileError({ path: filePath, reason: describeCause(err) });
    }
  }

  return hash.digest("hex").slice(0, FINGERPRINT_LENGTH);
};
