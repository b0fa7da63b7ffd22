import type { SpawnOptionsWithoutStdio } from "child_process";
import { spawn } from "child_process";

export const execCmd = async (...args: string[]): Promise<{ stdout: string; stderr: string }> => {
  return await execCmdWithOpts(args, {});
};

export class ExecCmdError extends Error {
  constructor(public readonly status: number | null, message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export const execCmdWithOpts = async (
  args: string[],
  options: SpawnOptionsWithoutStdio,
): Promise<{ stdout: string; stderr: string }> => {
  const [command, ...commandArgs] = args;
  if (command === void 0) {
    throw new Error("No command given");
  }
  return await new Promise((resolve, reject) => {
    const cp = spawn(command, commandArgs, options);
    let stdout = "";
    let stderr = "";
    cp.stdout.on("data", (data) => {
      stdout += data;
    });
    cp.stderr.on("data", (data) => {
      stderr += data;
    });
    cp.on("error", reject);
    cp.on("close", (status) => {
      if (status !== 0) {
        reject(
          new ExecCmdError(
            status,
            `Command "${args.join(
              " ",
            )}" failed with status ${status}, stdout: "${stdout}", stderr: ${stderr}`,
          ),
        );
      } else {
        resolve({
          stdout,
          stderr,
        });
      }
    });
  });
};

/**
 * Runs a command and returns its exit status instead of throwing on a non-zero one.
 * A process killed by a signal has no status and is reported as `-1`.
 * Failing to start the command at all still throws.
 */
export const execCmdForStatus = async (...args: string[]): Promise<number> => {
  try {
    await execCmd(...args);
    return 0;
  } catch (err) {
    if (err instanceof ExecCmdError) {
      return err.status ?? -1;
    }
    throw err;
  }
};
