import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

export type CommandFailure = "exit" | "timeout" | "not-found";

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly reason: CommandFailure,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = "CommandError";
  }
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

// Shape of the error execFile rejects with (promisify attaches stdout/stderr)
const ExecFailure = z.object({
  code: z.union([z.number(), z.string()]).nullish(),
  killed: z.boolean().optional(),
  signal: z.string().nullish(),
  stdout: z.union([z.string(), z.instanceof(Buffer)]).optional(),
  stderr: z.union([z.string(), z.instanceof(Buffer)]).optional(),
  message: z.string().optional(),
});

export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
      windowsHide: true,
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    const parsed = ExecFailure.safeParse(err);
    const failure: z.infer<typeof ExecFailure> = parsed.success ? parsed.data : {};
    const stderr = failure.stderr?.toString() ?? "";
    const stdout = failure.stdout?.toString() ?? "";

    if (failure.code === "ENOENT") {
      throw new CommandError(`Command not found: ${command}`, command, "not-found", null, stderr);
    }
    if (failure.killed && failure.signal) {
      throw new CommandError(
        `Command timed out after ${options?.timeoutMs ?? 0}ms (${command})`,
        command,
        "timeout",
        null,
        stderr
      );
    }

    const exitCode = typeof failure.code === "number" ? failure.code : 1;
    throw new CommandError(
      `Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr || failure.message || ""}\nSTDOUT: ${stdout}`,
      command,
      "exit",
      exitCode,
      stderr
    );
  }
};
