/**
 * Tests for configuration management
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { ConfigError } from "@/cli/errors.js";

import {
  DEFAULT_BASE_IMAGE,
  DEFAULT_IMAGE,
  getConfigPath,
  loadConfig,
  resolveSettings,
} from "./config.js";

const noCommit = (): string => "unknown";

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should return null when there is no config file", async () => {
    expect(await loadConfig({ repoRoot: tempDir })).toBeNull();
  });

  it("should load a valid config", async () => {
    const config = {
      namespace: "bedroom",
      image: "ghcr.io/example/img:latest",
      hooks: [
        {
          name: "dotfiles",
          script: "build_files/user-hooks/40-dotfiles.sh",
          extraDependencyGlob: "dotfiles/**/*",
        },
      ],
    };
    await fs.writeFile(getConfigPath({ repoRoot: tempDir }), JSON.stringify(config));

    expect(await loadConfig({ repoRoot: tempDir })).toEqual(config);
  });

  it("should fail on invalid JSON", async () => {
    await fs.writeFile(getConfigPath({ repoRoot: tempDir }), "{ not json");

    await expect(loadConfig({ repoRoot: tempDir })).rejects.toBeInstanceOf(
      ConfigError,
    );
  });

  it("should list every schema violation", async () => {
    await fs.writeFile(
      getConfigPath({ repoRoot: tempDir }),
      JSON.stringify({ image: "", colour: "blue" }),
    );

    await expect(loadConfig({ repoRoot: tempDir })).rejects.toMatchObject({
      violations: expect.arrayContaining([
        "Config validation error at (root): must NOT have additional properties",
        "Config validation error at /image: must NOT have fewer than 1 characters",
      ]),
    });
  });
});

describe("resolveSettings", () => {
  const repoRoot = "/work/repo";

  it("should fall back to defaults", () => {
    const settings = resolveSettings({ repoRoot, readCommit: noCommit });

    expect(settings).toEqual({
      context: {
        repoRoot,
        image: DEFAULT_IMAGE,
        base: DEFAULT_BASE_IMAGE,
        commit: "unknown",
      },
      outputPath: "/etc/hookstamp/build-manifest.json",
      extraHooks: [],
    });
  });

  it("should prefer options over environment over config", () => {
    const config = {
      image: "config/image:latest",
      base: "config/base:stable",
      output: "config-manifest.json",
    };
    const env = {
      IMAGE_NAME: "env/image:latest",
      BASE_IMAGE: "env/base:stable",
      MANIFEST_OUTPUT: "env-manifest.json",
    };

    const settings = resolveSettings({
      repoRoot,
      options: { image: "cli/image:latest" },
      env,
      config,
      readCommit: noCommit,
    });

    expect(settings.context.image).toBe("cli/image:latest");
    expect(settings.context.base).toBe("env/base:stable");
    expect(settings.outputPath).toBe("/work/repo/env-manifest.json");
  });

  it("should derive the default output path from the namespace", () => {
    const settings = resolveSettings({
      repoRoot,
      config: { namespace: "bedroom" },
      readCommit: noCommit,
    });

    expect(settings.outputPath).toBe("/etc/bedroom/build-manifest.json");
  });

  it("should take the commit from the environment before asking git", () => {
    const settings = resolveSettings({
      repoRoot,
      env: { GIT_COMMIT: "a3f2c1b" },
      readCommit: () => "ffffff0",
    });

    expect(settings.context.commit).toBe("a3f2c1b");
  });

  it("should ask git when the environment commit is unknown", () => {
    const settings = resolveSettings({
      repoRoot,
      env: { GIT_COMMIT: "unknown" },
      readCommit: () => "ffffff0",
    });

    expect(settings.context.commit).toBe("ffffff0");
  });

  it("should ignore blank values", () => {
    const settings = resolveSettings({
      repoRoot,
      options: { image: "  " },
      env: { IMAGE_NAME: "" },
      readCommit: noCommit,
    });

    expect(settings.context.image).toBe(DEFAULT_IMAGE);
  });

  it("should turn config hooks into hook definitions", () => {
    const settings = resolveSettings({
      repoRoot,
      config: {
        hooks: [{ name: "dotfiles", script: "hooks/dotfiles.sh" }],
      },
      readCommit: noCommit,
    });

    expect(settings.extraHooks).toEqual([
      { name: "dotfiles", script: "hooks/dotfiles.sh", extraDependencyGlob: null },
    ]);
  });
});
