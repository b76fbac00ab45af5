/**
 * Hook version gate
 *
 * Every first-boot hook carries the fingerprint baked in at build time. The
 * gate compares it with the last fingerprint the version store recorded for
 * that hook:
 *
 *   pending  -> body exits successfully -> recorded
 *   pending  -> body fails              -> pending (retried at next login)
 *   recorded fingerprint matches        -> skipped, body never runs
 *
 * A crashed or killed hook therefore reruns in full; it never marks itself
 * done halfway.
 */

import { SchemaViolationError, describeCause } from "@/cli/errors.js";
import { isFingerprint } from "@/cli/features/versioning/fingerprint.js";
import { info, warn } from "@/cli/logger.js";

import type { VersionStore } from "./versionStore.js";
import type { ModuleResult } from "@/cli/features/modules/result.js";
import type { ContentFingerprint } from "@/cli/features/versioning/fingerprint.js";

const HOOK_NAME_REGEX = /^[a-zA-Z0-9_-]+$/;

export type GateDecision = "skip" | "run";

export type GateOutcome =
  | { type: "skipped" }
  | { type: "recorded" }
  | { type: "pending"; reason: string; result: ModuleResult };

/**
 * Reject identifiers that could never have come out of the generator
 * @param args - Gate arguments
 * @param args.hookName - Hook identifier
 * @param args.fingerprint - Baked-in fingerprint
 */
const assertGateArgs = (args: {
  hookName: string;
  fingerprint: string;
}): void => {
  const { hookName, fingerprint } = args;
  if (!HOOK_NAME_REGEX.test(hookName)) {
    throw new SchemaViolationError({
      field: "hook name",
      message: `'${hookName}' must match ${HOOK_NAME_REGEX.source}`,
    });
  }
  if (!isFingerprint(fingerprint)) {
    // An unreplaced __CONTENT_VERSION__ lands here
    throw new SchemaViolationError({
      field: `fingerprint for ${hookName}`,
      message: `'${fingerprint}' (expected 8 lowercase hex characters)`,
    });
  }
};

/**
 * Decide whether a hook has to run
 * @param args - Gate arguments
 * @param args.store - Version-tracking store
 * @param args.hookName - Hook identifier
 * @param args.fingerprint - Fingerprint baked into the hook script
 *
 * @throws SchemaViolationError if the name or fingerprint is malformed
 *
 * @returns "skip" if the store already holds this fingerprint, "run" otherwise
 */
export const checkHookVersion = async (args: {
  store: VersionStore;
  hookName: string;
  fingerprint: ContentFingerprint;
}): Promise<GateDecision> => {
  const { store, hookName, fingerprint } = args;
  assertGateArgs({ hookName, fingerprint });

  const recorded = await store.lastKnownFingerprint({ hookName });
  return recorded === fingerprint ? "skip" : "run";
};

/**
 * Run a hook body behind the version gate
 * The fingerprint is recorded only after the body reports success. Any other
 * result leaves the store untouched and logs a diagnostic line; the caller
 * decides what that means for its exit code.
 *
 * @param args - Gate arguments
 * @param args.store - Version-tracking store
 * @param args.hookName - Hook identifier
 * @param args.fingerprint - Fingerprint baked into the hook script
 * @param args.body - The hook's side effects
 *
 * @returns skipped, recorded, or pending with the reason
 */
export const runGatedHook = async (args: {
  store: VersionStore;
  hookName: string;
  fingerprint: ContentFingerprint;
  body: () => Promise<ModuleResult>;
}): Promise<GateOutcome> => {
  const { store, hookName, fingerprint, body } = args;

  const decision = await checkHookVersion({ store, hookName, fingerprint });
  if (decision === "skip") {
    info({
      message: `Hook ${hookName} already at version ${fingerprint}, skipping`,
    });
    return { type: "skipped" };
  }

  info({ message: `Hook ${hookName} starting (version ${fingerprint})` });

  let result: ModuleResult;
  try {
    result = await body();
  } catch (err) {
    result = { type: "failure", reason: describeCause(err) };
  }

  if (result.type !== "success") {
    const reason = `hook body did not succeed: ${result.reason}`;
    warn({
      message: `Hook ${hookName} left at pending (${reason}); it will run again at next login`,
    });
    return { type: "pending", reason, result };
  }

  try {
    await store.recordFingerprint({ hookName, fingerprint });
  } catch (err) {
    const reason = `failed to record version: ${describeCause(err)}`;
    warn({
      message: `Hook ${hookName} left at pending (${reason}); it will run again at next login`,
    });
    return { type: "pending", reason, result: { type: "failure", reason } };
  }

  info({ message: `Hook ${hookName} completed, recorded version ${fingerprint}` });
  return { type: "recorded" };
};
