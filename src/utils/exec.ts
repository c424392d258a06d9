import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
}

export class ExecError extends Error {
  public readonly command: string;
  // Exit status, or the errno string (e.g. "ENOENT") when the file could not be spawned
  public readonly code: number | string | null;
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly timedOut: boolean;

  constructor(command: string, code: number | string | null, stdout: string, stderr: string, timedOut = false) {
    super(timedOut ? `Command timed out (${command})` : `Command failed (${command})`);
    this.command = command;
    this.code = code;
    this.stdout = stdout;
    this.stderr = stderr;
    this.timedOut = timedOut;
  }

  get notFound(): boolean {
    return this.code === "ENOENT";
  }
}

export type CommandRunner = (file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

export const execFileCommand = async (file: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: "utf-8",
    cwd: options.cwd,
    timeout: options.timeoutMs,
    windowsHide: true,
    maxBuffer: 4 * 1024 * 1024,
  });
  return { stdout: stdout.trim(), stderr: stderr.trim() };
};

interface ExecFailure {
  stdout?: string;
  stderr?: string;
  code?: number | string | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

const isExecFailure = (error: unknown): error is Error & ExecFailure => error instanceof Error;

export const execFileSafe: CommandRunner = async (file, args, options = {}) => {
  const command = [file, ...args].join(" ");
  try {
    return await execFileCommand(file, args, options);
  } catch (error) {
    if (!isExecFailure(error)) {
      throw new ExecError(command, null, "", String(error));
    }
    const { stdout = "", stderr = "", code = null, killed = false, signal = null } = error;
    const timedOut = killed && signal !== null && options.timeoutMs !== undefined;
    throw new ExecError(command, code, String(stdout).trim(), String(stderr).trim(), timedOut);
  }
};
