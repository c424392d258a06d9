import type { ChannelStatus, CommandSpec, LogLevel } from "./types.js";
import { describeError } from "./errors.js";
import {
  type ProcessSpawner,
  type SpawnedProcess,
  closeStreams,
  readMergedLines,
  spawnProcess,
  waitForSpawn,
  withTimeout,
} from "./pipes.js";

export const STOP_GRACE_MS = 5_000;

/** Exit code reported when the encoder never started or vanished without a status. */
export const LAUNCH_FAILURE_EXIT_CODE = -1;

export type ChannelProcessEvent =
  | { type: "log"; level: LogLevel; message: string }
  | { type: "status"; status: ChannelStatus }
  | { type: "exit"; exitCode: number; requested: boolean };

export interface ChannelProcessOptions {
  description: string;
  onEvent: (event: ChannelProcessEvent) => void;
  spawner?: ProcessSpawner;
  stopGraceMs?: number;
}

export type LaunchResult = { launched: true } | { launched: false; error: Error };

interface EncoderRun {
  child: SpawnedProcess;
  stopRequested: boolean;
  settled: boolean;
  reader: Promise<void>;
  closed: Promise<void>;
  markClosed: () => void;
}

/** Map one line of ffmpeg output to a log level. */
export const classifyEncoderLine = (line: string): LogLevel => {
  if (/^(frame|size)=/.test(line) || /\bspeed=\s*\S+x\b/.test(line) || /Opening '.*' for writing/.test(line)) {
    return "verbose";
  }
  if (/\b(error|failed|could not|cannot|invalid|no such)\b/i.test(line)) {
    return "error";
  }
  if (/\b(warning|deprecated|past duration|dropping|buffer full)\b/i.test(line)) {
    return "warn";
  }
  return "info";
};

/**
 * Lifecycle of one encoder subprocess: Idle → Starting → Running → Stopping → Idle, with
 * Failed(code) → Idle when the process ends on its own with a non-zero status.
 *
 * Whether an exit was asked for is recorded when stop() is called, not inferred afterwards,
 * so a natural exit racing a stop request is still reported as a requested stop.
 */
export class ChannelProcess {
  private readonly description: string;
  private readonly onEvent: (event: ChannelProcessEvent) => void;
  private readonly spawner: ProcessSpawner;
  private readonly stopGraceMs: number;
  private run: EncoderRun | undefined;
  private currentStatus: ChannelStatus = { state: "idle" };

  constructor(options: ChannelProcessOptions) {
    this.description = options.description;
    this.onEvent = options.onEvent;
    this.spawner = options.spawner ?? spawnProcess;
    this.stopGraceMs = options.stopGraceMs ?? STOP_GRACE_MS;
  }

  get status(): ChannelStatus {
    return this.currentStatus;
  }

  get isActive(): boolean {
    return this.run !== undefined;
  }

  get pid(): number | undefined {
    return this.run?.child.pid;
  }

  /**
   * Launch the encoder. Resolves once the process is running or has failed to launch; a
   * launch failure is reported through the event stream and the result, never thrown.
   */
  async start(command: CommandSpec): Promise<LaunchResult> {
    if (this.run) {
      this.log("warn", `${this.description} is already running (pid ${this.run.child.pid ?? "unknown"})`);
      return { launched: true };
    }

    this.setStatus({ state: "starting" });

    let child: SpawnedProcess;
    try {
      child = this.spawner(command.command, command.args, { keepStdinOpen: true });
    } catch (error) {
      this.log("error", `Failed to start ${this.description}: ${describeError(error)}`);
      this.finishWithoutRun(LAUNCH_FAILURE_EXIT_CODE);
      return { launched: false, error: error instanceof Error ? error : new Error(describeError(error)) };
    }

    let markClosed: () => void = () => {};
    const closed = new Promise<void>((resolve) => {
      markClosed = resolve;
    });

    const run: EncoderRun = {
      child,
      stopRequested: false,
      settled: false,
      reader: readMergedLines(child, (line) => this.log(classifyEncoderLine(line), line)),
      closed,
      markClosed,
    };
    this.run = run;

    const spawnResult = waitForSpawn(child);

    child.stdin?.on("error", (error) => {
      // EPIPE once the encoder has gone away; during a stop this means "escalate"
      this.log("verbose", `${this.description} input closed: ${error.message}`);
      if (run.stopRequested && !run.settled) {
        this.forceKill(run);
      }
    });

    child.once("close", (code, signal) => {
      this.onClose(run, code, signal).catch((error: unknown) => {
        this.log("error", `Failed to finalise ${this.description}: ${describeError(error)}`);
      });
    });

    const result = await spawnResult;

    if (!result.spawned) {
      const notFound = "code" in result.error && result.error.code === "ENOENT";
      this.log(
        "error",
        notFound
          ? `Error: ${command.command} not found. Please check the encoder path.`
          : `Failed to start ${this.description}: ${result.error.message}`,
      );
      this.settle(run, LAUNCH_FAILURE_EXIT_CODE);
      return { launched: false, error: result.error };
    }

    // Persistent handler so late process errors (e.g. a failed kill) cannot go unhandled
    child.on("error", (error) => this.log("warn", `${this.description}: ${error.message}`));

    if (!run.settled && !run.stopRequested) {
      this.log("verbose", `${this.description} started with pid ${child.pid ?? "unknown"}`);
      this.setStatus({ state: "running" });
    }
    return { launched: true };
  }

  /**
   * Ask the encoder to quit ("q" on stdin), wait up to the grace period, then kill it.
   * Resolves when the process handle has been released.
   */
  async stop(): Promise<void> {
    const run = this.run;

    if (!run) {
      this.log("info", `${this.description} is not running`);
      return;
    }

    if (run.stopRequested) {
      await run.closed;
      return;
    }

    run.stopRequested = true;
    this.setStatus({ state: "stopping" });
    this.log("info", `Stopping ${this.description}...`);

    if (this.sendQuit(run)) {
      const exited = await withTimeout(
        run.closed.then(() => true),
        this.stopGraceMs,
      );
      if (exited) {
        return;
      }
      this.log("warn", `${this.description} did not stop gracefully, terminating.`);
    }

    this.forceKill(run);

    const killed = await withTimeout(
      run.closed.then(() => true),
      this.stopGraceMs,
    );
    if (!killed) {
      this.log("error", `${this.description} did not exit after being killed; releasing its handles`);
      this.settle(run, LAUNCH_FAILURE_EXIT_CODE);
    }
  }

  private sendQuit(run: EncoderRun): boolean {
    const stdin = run.child.stdin;
    if (!stdin || stdin.destroyed || !stdin.writable) {
      return false;
    }

    try {
      stdin.write("q\n");
      return true;
    } catch (error) {
      this.log("warn", `Could not send quit to ${this.description}: ${describeError(error)}`);
      return false;
    }
  }

  private forceKill(run: EncoderRun): void {
    try {
      run.child.kill("SIGKILL");
    } catch (error) {
      this.log("warn", `Failed to kill ${this.description}: ${describeError(error)}`);
    }
  }

  private async onClose(run: EncoderRun, code: number | null, signal: NodeJS.Signals | null): Promise<void> {
    // Let the reader drain what the process printed before its exit is reported
    await withTimeout(run.reader, 1_000);
    if (signal) {
      this.log("verbose", `${this.description} terminated by ${signal}`);
    }
    this.settle(run, code ?? LAUNCH_FAILURE_EXIT_CODE);
  }

  private settle(run: EncoderRun, exitCode: number): void {
    if (run.settled) {
      return;
    }
    run.settled = true;

    closeStreams(run.child);
    if (this.run === run) {
      this.run = undefined;
    }

    const failed = !run.stopRequested && exitCode !== 0;
    this.log(failed ? "error" : "info", `${this.description} finished with code ${exitCode}`);
    this.onEvent({ type: "exit", exitCode, requested: run.stopRequested });

    if (failed) {
      this.setStatus({ state: "failed", exitCode });
    }
    this.setStatus({ state: "idle" });
    run.markClosed();
  }

  private finishWithoutRun(exitCode: number): void {
    this.onEvent({ type: "exit", exitCode, requested: false });
    this.setStatus({ state: "failed", exitCode });
    this.setStatus({ state: "idle" });
  }

  private setStatus(status: ChannelStatus): void {
    this.currentStatus = status;
    this.onEvent({ type: "status", status });
  }

  private log(level: LogLevel, message: string): void {
    this.onEvent({ type: "log", level, message });
  }
}
