/**
 * Module results
 *
 * Build modules and hook bodies signal one of three outcomes. At process
 * boundaries these map onto the exit-code convention of the surrounding
 * scripts: 0 success, 2 intentional skip, anything else failure.
 */

export type ModuleResult =
  | { type: "success" }
  | { type: "skip"; reason: string }
  | { type: "failure"; reason: string };

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_SKIP = 2;

/**
 * Map a result to its process exit code
 * @param result - Module result
 *
 * @returns 0, 2 or 1
 */
export const toExitCode = (result: ModuleResult): number => {
  switch (result.type) {
    case "success":
      return EXIT_SUCCESS;
    case "skip":
      return EXIT_SKIP;
    case "failure":
      return EXIT_FAILURE;
  }
};

/**
 * Map a process exit status to a result
 * @param args - Exit status
 * @param args.code - Exit code, or null if the process was killed
 * @param args.signal - Terminating signal, if any
 *
 * @returns The corresponding module result
 */
export const fromExitCode = (args: {
  code: number | null;
  signal?: string | null;
}): ModuleResult => {
  const { code, signal } = args;

  if (code === EXIT_SUCCESS) {
    return { type: "success" };
  }
  if (code === EXIT_SKIP) {
    return { type: "skip", reason: "exited with code 2 (skip)" };
  }
  if (code == null) {
    return { type: "failure", reason: `terminated by ${signal ?? "signal"}` };
  }
  return { type: "failure", reason: `exited with code ${code}` };
};
