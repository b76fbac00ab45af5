#!/usr/bin/env node

/**
 * hookstamp CLI Router
 *
 * Routes commands to the build-time and runtime entry points using commander.js.
 */

import { Command } from "commander";

import { registerBuildInfoCommand } from "@/cli/commands/build-info/buildInfo.js";
import { registerGateCommand } from "@/cli/commands/gate/gate.js";
import { registerGenerateCommand } from "@/cli/commands/generate/generate.js";
import { registerStampCommand } from "@/cli/commands/stamp/stamp.js";
import { registerValidateCommand } from "@/cli/commands/validate/validate.js";
import { setSilentMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

const program = new Command();
const version = getCurrentPackageVersion() || "unknown";

program
  .name("hookstamp")
  .version(version)
  .description(
    `hookstamp - content-addressed build manifest and first-boot hook versioning v${version}`,
  )
  .option("-s, --silent", "Suppress all output except errors and results")
  .hook("preAction", () => {
    setSilentMode({ silent: program.opts<{ silent?: boolean }>().silent === true });
  })
  .addHelpText(
    "after",
    `
Examples:
  $ hookstamp generate --repo-root . --commit a3f2c1b
  $ hookstamp stamp wallpaper hooks/10-wallpaper.sh
  $ hookstamp validate /etc/hookstamp/build-manifest.json
  $ hookstamp gate check wallpaper 1c4e9f2a
  $ hookstamp gate run welcome 5b8d3e1f -- ./welcome.sh
  $ hookstamp build-info --json
`,
  );

// Register all commands
registerGenerateCommand({ program });
registerValidateCommand({ program });
registerStampCommand({ program });
registerGateCommand({ program });
registerBuildInfoCommand({ program });

// Show help if no command provided
if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);
