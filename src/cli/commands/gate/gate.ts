/**
 * Gate Command
 *
 * Runtime side of hook versioning, called from first-boot hook scripts:
 *
 *   hookstamp gate check wallpaper 1c4e9f2a        # prints "skip" or "run"
 *   hookstamp gate run wallpaper 1c4e9f2a -- ./apply-wallpaper.sh
 */

import { spawn } from "child_process";

import { formatError } from "@/cli/errors.js";
import { checkHookVersion, runGatedHook } from "@/cli/features/gate/gate.js";
import {
  createFileVersionStore,
  getDefaultStorePath,
} from "@/cli/features/gate/versionStore.js";
import {
  EXIT_SUCCESS,
  fromExitCode,
  toExitCode,
} from "@/cli/features/modules/result.js";
import { error, raw } from "@/cli/logger.js";
import { normalizePath } from "@/utils/path.js";

import type { VersionStore } from "@/cli/features/gate/versionStore.js";
import type { ModuleResult } from "@/cli/features/modules/result.js";
import type { Command } from "commander";

/**
 * Run a command as the hook body, inheriting stdio
 * @param args - Command arguments
 * @param args.command - Executable and its arguments
 *
 * @returns The command's outcome
 */
export const runCommandBody = (args: {
  command: ReadonlyArray<string>;
}): Promise<ModuleResult> => {
  const [executable, ...rest] = args.command;
  if (executable == null) {
    return Promise.resolve({ type: "failure", reason: "no command given" });
  }

  return new Promise((resolve) => {
    const child = spawn(executable, rest, { stdio: "inherit" });
    child.on("error", (err) => {
      resolve({ type: "failure", reason: err.message });
    });
    child.on("close", (code, signal) => {
      resolve(fromExitCode({ code, signal }));
    });
  });
};

/**
 * Print the gate decision for a hook
 * @param args - Check arguments
 * @param args.store - Version store
 * @param args.hookName - Hook identifier
 * @param args.fingerprint - Baked-in fingerprint
 *
 * @returns Process exit code
 */
export const runGateCheck = async (args: {
  store: VersionStore;
  hookName: string;
  fingerprint: string;
}): Promise<number> => {
  try {
    raw({ message: await checkHookVersion(args) });
    return EXIT_SUCCESS;
  } catch (err) {
    for (const line of formatError(err)) {
      error({ message: line });
    }
    return 1;
  }
};

/**
 * Run a hook body behind the gate
 * @param args - Run arguments
 * @param args.store - Version store
 * @param args.hookName - Hook identifier
 * @param args.fingerprint - Baked-in fingerprint
 * @param args.body - Hook body
 *
 * @returns Process exit code: 0 when skipped or recorded, the body's otherwise
 */
export const runGateRun = async (args: {
  store: VersionStore;
  hookName: string;
  fingerprint: string;
  body: () => Promise<ModuleResult>;
}): Promise<number> => {
  try {
    const outcome = await runGatedHook(args);
    return outcome.type === "pending" ? toExitCode(outcome.result) : EXIT_SUCCESS;
  } catch (err) {
    for (const line of formatError(err)) {
      error({ message: line });
    }
    return 1;
  }
};

/**
 * Register the 'gate' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerGateCommand = (args: { program: Command }): void => {
  const { program } = args;

  const gate = program
    .command("gate")
    .description("Decide whether a versioned first-boot hook has to run");

  gate
    .command("check")
    .description('Print "skip" if the fingerprint is already applied, "run" otherwise')
    .argument("<hook>", "Hook name")
    .argument("<fingerprint>", "Fingerprint baked into the hook")
    .option("--store <path>", "Version store file", getDefaultStorePath())
    .action(
      async (hook: string, fingerprint: string, options: { store: string }) => {
        const exitCode = await runGateCheck({
          store: createFileVersionStore({
            filePath: normalizePath({ value: options.store }),
          }),
          hookName: hook,
          fingerprint,
        });
        process.exit(exitCode);
      },
    );

  gate
    .command("run")
    .description("Run a command unless the fingerprint is applied; record it on success")
    .argument("<hook>", "Hook name")
    .argument("<fingerprint>", "Fingerprint baked into the hook")
    .argument("<command...>", "Hook body (put it after --)")
    .option("--store <path>", "Version store file", getDefaultStorePath())
    .action(
      async (
        hook: string,
        fingerprint: string,
        command: Array<string>,
        options: { store: string },
      ) => {
        const exitCode = await runGateRun({
          store: createFileVersionStore({
            filePath: normalizePath({ value: options.store }),
          }),
          hookName: hook,
          fingerprint,
          body: () => runCommandBody({ command }),
        });
        process.exit(exitCode);
      },
    );
};
