import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export type CommandResult = {
  stdout: string;
  stderr: string;
};

/**
 * Seam for every external command-line tool the pipeline drives
 * (ffmpeg, ffprobe, edge-tts, rclone). Tests swap in a fake.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    maxBuffer: 64 * 1024 * 1024,
  });
  return { stdout, stderr };
};

/** True when `command` can be spawned at all (ENOENT means not installed). */
export async function commandExists(
  runner: CommandRunner,
  command: string,
  probeArgs: string[] = ["--version"]
): Promise<boolean> {
  try {
    await runner(command, probeArgs);
    return true;
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return false;
    // The binary exists but rejected the probe flags.
    return true;
  }
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
