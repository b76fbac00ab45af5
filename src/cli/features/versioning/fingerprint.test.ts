/**
 * Tests for content fingerprints
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { EmptyInputError, MissingFileError } from "@/cli/errors.js";

import {
  computeFingerprint,
  isFingerprint,
  sortPathsBytewise,
} from "./fingerprint.js";

describe("computeFingerprint", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "fingerprint-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeFixture = async (name: string, content: string): Promise<string> => {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  };

  it("should hash the concatenated content in sorted path order", async () => {
    const a = await writeFixture("a.txt", "hel");
    const b = await writeFixture("b.txt", "lo");

    // sha256("hello") = 2cf24dba5fb0a30e...
    expect(await computeFingerprint({ paths: [a, b] })).toBe("2cf24dba");
  });

  it("should be independent of input order", async () => {
    const a = await writeFixture("a.txt", "hel");
    const b = await writeFixture("b.txt", "lo");
    const c = await writeFixture("c.txt", "");

    const expected = await computeFingerprint({ paths: [a, b, c] });
    expect(await computeFingerprint({ paths: [c, b, a] })).toBe(expected);
    expect(await computeFingerprint({ paths: [b, c, a] })).toBe(expected);
  });

  it("should be deterministic across repeated calls", async () => {
    const script = await writeFixture("hook.sh", "#!/bin/bash\necho hi\n");

    const results = await Promise.all(
      Array.from({ length: 5 }, () => computeFingerprint({ paths: [script] })),
    );

    expect(new Set(results).size).toBe(1);
    expect(isFingerprint(results[0])).toBe(true);
  });

  it("should change when file content changes", async () => {
    const script = await writeFixture("hook.sh", "version one");
    const before = await computeFingerprint({ paths: [script] });

    await fs.writeFile(script, "version two");

    expect(await computeFingerprint({ paths: [script] })).not.toBe(before);
  });

  it("should hash a repeated path once", async () => {
    const a = await writeFixture("a.txt", "hello");

    expect(await computeFingerprint({ paths: [a, a] })).toBe("2cf24dba");
  });

  it("should reject an empty path list", async () => {
    await expect(computeFingerprint({ paths: [] })).rejects.toBeInstanceOf(
      EmptyInputError,
    );
  });

  it("should name the missing path", async () => {
    const missing = path.join(tempDir, "does/not/exist");

    const result = computeFingerprint({ paths: [missing] });

    await expect(result).rejects.toBeInstanceOf(MissingFileError);
    await expect(result).rejects.toMatchObject({ path: missing });
  });

  it("should fail on the first offending path even when others exist", async () => {
    const a = await writeFixture("a.txt", "hello");
    const missing = path.join(tempDir, "missing.txt");

    await expect(
      computeFingerprint({ paths: [a, missing] }),
    ).rejects.toMatchObject({ path: missing });
  });

  it("should reject directories", async () => {
    const dir = path.join(tempDir, "subdir");
    await fs.mkdir(dir);

    await expect(computeFingerprint({ paths: [dir] })).rejects.toMatchObject({
      path: dir,
    });
  });
});

describe("isFingerprint", () => {
  it("should accept 8 lowercase hex characters", () => {
    expect(isFingerprint("1c4e9f2a")).toBe(true);
  });

  it("should reject other values", () => {
    expect(isFingerprint("1C4E9F2A")).toBe(false);
    expect(isFingerprint("1c4e9f2")).toBe(false);
    expect(isFingerprint("1c4e9f2ab")).toBe(false);
    expect(isFingerprint("__CONTENT_VERSION__")).toBe(false);
    expect(isFingerprint(12345678)).toBe(false);
  });
});

describe("sortPathsBytewise", () => {
  it("should sort by bytes rather than locale", () => {
    expect(sortPathsBytewise(["b", "B", "a", "_x"])).toEqual(["B", "_x", "a", "b"]);
  });
});
