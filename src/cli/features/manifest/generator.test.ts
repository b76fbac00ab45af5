/**
 * Tests for the manifest generator
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { MissingFileError } from "@/cli/errors.js";
import { KNOWN_HOOKS } from "@/cli/features/hooks/registry.js";
import { isFingerprint } from "@/cli/features/versioning/fingerprint.js";

import type { BuildContext } from "@/cli/config.js";
import type { HookDefinition } from "@/cli/features/hooks/types.js";
import type { MockInstance } from "vitest";

import {
  buildManifest,
  fingerprintEnvLines,
  generate,
  hasHookChanged,
  resolveHookDependencies,
} from "./generator.js";
import { loadManifest } from "./manifest.js";
import { MANIFEST_SIZE_WARNING_BYTES } from "./writer.js";

const NOW = new Date("2025-10-10T12:00:00Z");

const EXTENSIONS = Array.from(
  { length: 15 },
  (_, i) => `publisher.extension-${i + 1}`,
);

const pickHooks = (names: Array<string>): Array<HookDefinition> =>
  KNOWN_HOOKS.filter((hook) => names.includes(hook.name));

describe("generator", () => {
  let repoRoot: string;
  let outputPath: string;
  let context: BuildContext;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  const writeRepoFile = async (relative: string, content: string): Promise<void> => {
    const filePath = path.join(repoRoot, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  };

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), "generator-test-"));
    outputPath = path.join(repoRoot, "out", "etc", "hookstamp", "build-manifest.json");
    context = {
      repoRoot,
      image: "ghcr.io/example/img:latest",
      base: "ghcr.io/ublue-os/bluefin-dx:stable",
      commit: "a3f2c1b",
    };
    consoleErrorSpy = vi
      .spyOn(console, "error")
      .mockImplementation(() => undefined);

    await writeRepoFile(
      "build_files/user-hooks/10-wallpaper-enforcement.sh",
      "#!/usr/bin/env bash\necho wallpaper\n",
    );
    await writeRepoFile("custom_wallpapers/a.png", "image-a");
    await writeRepoFile("custom_wallpapers/b.png", "image-b");
    await writeRepoFile(
      "build_files/user-hooks/20-vscode-extensions.sh",
      "#!/usr/bin/env bash\necho extensions\n",
    );
    await writeRepoFile(
      "vscode-extensions.list",
      `# editor extensions\n\n${EXTENSIONS.join("\n")}\n`,
    );
    await writeRepoFile(
      "build_files/user-hooks/30-holotree-init.sh",
      "#!/usr/bin/env bash\necho holotree\n",
    );
  });

  afterEach(async () => {
    consoleErrorSpy.mockRestore();
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  describe("resolveHookDependencies", () => {
    it("should list the script and its globbed data files in sorted order", async () => {
      const [wallpaper] = pickHooks(["wallpaper"]);

      const result = await resolveHookDependencies({ repoRoot, hook: wallpaper });

      expect(result).toEqual({
        dependencies: [
          "build_files/user-hooks/10-wallpaper-enforcement.sh",
          "custom_wallpapers/a.png",
          "custom_wallpapers/b.png",
        ],
        extraDependencies: ["custom_wallpapers/a.png", "custom_wallpapers/b.png"],
      });
    });

    it("should include hidden files matched by the glob", async () => {
      await writeRepoFile("custom_wallpapers/.night.png", "image-night");
      const [wallpaper] = pickHooks(["wallpaper"]);

      const result = await resolveHookDependencies({ repoRoot, hook: wallpaper });

      expect(result.extraDependencies).toEqual([
        "custom_wallpapers/.night.png",
        "custom_wallpapers/a.png",
        "custom_wallpapers/b.png",
      ]);
    });

    it("should list only the script when there is no glob", async () => {
      const [holotree] = pickHooks(["holotree-init"]);

      const result = await resolveHookDependencies({ repoRoot, hook: holotree });

      expect(result).toEqual({
        dependencies: ["build_files/user-hooks/30-holotree-init.sh"],
        extraDependencies: [],
      });
    });
  });

  describe("generate", () => {
    it("should write a manifest covering every hook", async () => {
      const fingerprints = await generate({
        hooks: pickHooks(["wallpaper", "vscode-extensions", "holotree-init"]),
        context,
        outputPath,
        now: NOW,
      });

      expect(Object.keys(fingerprints)).toEqual([
        "wallpaper",
        "vscode-extensions",
        "holotree-init",
      ]);
      for (const fingerprint of Object.values(fingerprints)) {
        expect(isFingerprint(fingerprint)).toBe(true);
      }

      const manifest = await loadManifest({ manifestPath: outputPath });
      expect(manifest?.build).toEqual({
        date: "2025-10-10T12:00:00Z",
        image: "ghcr.io/example/img:latest",
        base: "ghcr.io/ublue-os/bluefin-dx:stable",
        commit: "a3f2c1b",
      });
      expect(manifest?.hooks.wallpaper.version).toBe(fingerprints.wallpaper);
      expect(manifest?.hooks.wallpaper.metadata).toEqual({
        wallpaper_count: 2,
        changed: true,
      });
      expect(manifest?.hooks["vscode-extensions"].metadata).toEqual({
        extension_count: 15,
        changed: true,
      });
      expect(manifest?.hooks["holotree-init"]).toEqual({
        version: fingerprints["holotree-init"],
        dependencies: ["build_files/user-hooks/30-holotree-init.sh"],
        metadata: { changed: true },
      });

      const stats = await fs.stat(outputPath);
      expect(stats.mode & 0o777).toBe(0o644);
      expect(stats.size).toBeLessThan(MANIFEST_SIZE_WARNING_BYTES);
    });

    it("should produce identical fingerprints for an unchanged tree", async () => {
      const hooks = pickHooks(["wallpaper", "holotree-init"]);

      const first = await generate({ hooks, context, outputPath, now: NOW });
      const second = await generate({ hooks, context, outputPath, now: NOW });

      expect(second).toEqual(first);
    });

    it("should abort without writing when a hook script is missing", async () => {
      await fs.rm(path.join(repoRoot, "build_files/user-hooks/30-holotree-init.sh"));

      await expect(
        generate({
          hooks: pickHooks(["wallpaper", "holotree-init"]),
          context,
          outputPath,
          now: NOW,
        }),
      ).rejects.toBeInstanceOf(MissingFileError);
      await expect(fs.access(outputPath)).rejects.toThrow();
    });
  });

  describe("buildManifest", () => {
    it("should flag only the hooks whose content changed since the previous build", async () => {
      const hooks = pickHooks(["wallpaper", "holotree-init"]);
      const previousManifest = await buildManifest({ hooks, context, now: NOW });

      const unchanged = await buildManifest({
        hooks,
        context,
        previousManifest,
        now: NOW,
      });
      expect(unchanged.hooks.wallpaper.metadata?.changed).toBe(false);
      expect(unchanged.hooks["holotree-init"].metadata?.changed).toBe(false);

      await writeRepoFile("custom_wallpapers/c.png", "image-c");

      const updated = await buildManifest({
        hooks,
        context,
        previousManifest,
        now: NOW,
      });
      expect(updated.hooks.wallpaper.metadata).toEqual({
        wallpaper_count: 3,
        changed: true,
      });
      expect(updated.hooks.wallpaper.version).not.toBe(
        previousManifest.hooks.wallpaper.version,
      );
      expect(updated.hooks["holotree-init"].metadata?.changed).toBe(false);
    });

    it("should count a wallpaper hook with no wallpapers as zero", async () => {
      await fs.rm(path.join(repoRoot, "custom_wallpapers"), {
        recursive: true,
        force: true,
      });

      const manifest = await buildManifest({
        hooks: pickHooks(["wallpaper"]),
        context,
        now: NOW,
      });

      expect(manifest.hooks.wallpaper.dependencies).toEqual([
        "build_files/user-hooks/10-wallpaper-enforcement.sh",
      ]);
      expect(manifest.hooks.wallpaper.metadata?.wallpaper_count).toBe(0);
    });
  });
});

describe("hasHookChanged", () => {
  it("should report a change when there is no previous manifest", () => {
    expect(
      hasHookChanged({ previousManifest: null, name: "welcome", fingerprint: "5b8d3e1f" }),
    ).toBe(true);
  });
});

describe("fingerprintEnvLines", () => {
  it("should upper-case names and replace non-alphanumerics", () => {
    expect(
      fingerprintEnvLines({
        fingerprints: {
          wallpaper: "1c4e9f2a",
          "vscode-extensions": "0a1b2c3d",
        },
      }),
    ).toEqual(["WALLPAPER_VERSION=1c4e9f2a", "VSCODE_EXTENSIONS_VERSION=0a1b2c3d"]);
  });
});
