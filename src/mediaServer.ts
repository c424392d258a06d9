import path from "path";
import fs from "fs-extra";
import type { Logger } from "./utils/logger.js";
import type { MediaServerConfig } from "./types.js";
import { type CommandRunner, execFileSafe } from "./utils/exec.js";
import { DependentServiceUnavailableError, describeError } from "./errors.js";
import { type ProcessSpawner, type SpawnedProcess, spawnProcess, waitForSpawn, withTimeout } from "./pipes.js";

export const MEDIA_SERVER_STOP_TIMEOUT_MS = 2_000;

/** Reference-counted shared process that channels need while they are live. */
export interface DependentService {
  readonly isRunning: boolean;
  readonly activeChannelCount: number;
  acquire(): Promise<void>;
  release(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface MediaServerOptions extends MediaServerConfig {
  logger: Logger;
  spawner?: ProcessSpawner;
  run?: CommandRunner;
  stopTimeoutMs?: number;
  platform?: NodeJS.Platform;
}

interface ServerHandle {
  child: SpawnedProcess;
  exited: Promise<void>;
  hasExited: boolean;
  stopping: boolean;
}

/**
 * The nginx instance that publishes the HLS output folders. Started by the first channel
 * that goes live and stopped when the last one stops.
 */
export class MediaServer implements DependentService {
  private readonly directory: string;
  private readonly executable: string;
  private readonly logger: Logger;
  private readonly spawner: ProcessSpawner;
  private readonly run: CommandRunner;
  private readonly stopTimeoutMs: number;
  private readonly platform: NodeJS.Platform;
  private handle: ServerHandle | undefined;
  private count = 0;

  constructor(options: MediaServerOptions) {
    this.directory = options.directory;
    this.executable = options.executable;
    this.logger = options.logger;
    this.spawner = options.spawner ?? spawnProcess;
    this.run = options.run ?? execFileSafe;
    this.stopTimeoutMs = options.stopTimeoutMs ?? MEDIA_SERVER_STOP_TIMEOUT_MS;
    this.platform = options.platform ?? process.platform;
  }

  get executablePath(): string {
    return path.isAbsolute(this.executable) ? this.executable : path.join(this.directory, this.executable);
  }

  get isRunning(): boolean {
    return this.handle !== undefined && !this.handle.hasExited;
  }

  get activeChannelCount(): number {
    return this.count;
  }

  get pid(): number | undefined {
    return this.isRunning ? this.handle?.child.pid : undefined;
  }

  async acquire(): Promise<void> {
    if (!this.isRunning) {
      if (this.count > 0) {
        this.logger.warn("Media server is gone while channels are live, restarting it.");
      }
      await this.launch();
    }
    this.count += 1;
    this.logger.verboseLog(`Media server references: ${this.count}`);
  }

  async release(): Promise<void> {
    if (this.count === 0) {
      this.logger.verboseLog("Media server release without a matching acquire ignored");
      return;
    }

    this.count -= 1;
    this.logger.verboseLog(`Media server references: ${this.count}`);

    if (this.count === 0) {
      this.logger.info("No active streams. Stopping media server...");
      await this.stop();
    }
  }

  async shutdown(): Promise<void> {
    this.count = 0;
    await this.stop();
  }

  private async launch(): Promise<void> {
    const executable = this.executablePath;

    if (!(await fs.pathExists(executable))) {
      throw new DependentServiceUnavailableError(`Media server not found at: ${executable}`);
    }

    // With live channels a running copy may be the one serving them
    if (this.count === 0) {
      await this.killStrayInstances();
    }

    this.logger.info("Starting media server...");

    let child: SpawnedProcess;
    try {
      child = this.spawner(executable, this.launchArgs(), { cwd: this.directory });
    } catch (error) {
      throw new DependentServiceUnavailableError(`Failed to start media server: ${describeError(error)}`, {
        cause: error,
      });
    }

    const result = await waitForSpawn(child);
    if (!result.spawned) {
      throw new DependentServiceUnavailableError(`Failed to start media server: ${result.error.message}`, {
        cause: result.error,
      });
    }

    const handle: ServerHandle = {
      child,
      hasExited: false,
      stopping: false,
      exited: new Promise<void>((resolve) => {
        child.once("close", (code, signal) => {
          handle.hasExited = true;
          if (!handle.stopping) {
            this.logger.warn(`Media server exited unexpectedly with code ${code ?? "none"} signal ${signal ?? "none"}`);
          }
          resolve();
        });
      }),
    };

    child.on("error", (error) => this.logger.warn(`Media server: ${error.message}`));
    child.stdout?.resume();
    child.stderr?.resume();

    this.handle = handle;
    this.logger.info(`Media server started with PID: ${child.pid ?? "unknown"}`);
  }

  // nginx daemonises by default elsewhere, leaving the launched parent to exit at once
  private launchArgs(): string[] {
    const args = ["-p", this.directory];
    return this.platform === "win32" ? args : [...args, "-g", "daemon off;"];
  }

  /** Orphans from an earlier crash would hold the listening port. */
  private async killStrayInstances(): Promise<void> {
    const name = path.basename(this.executablePath);
    const [file, args]: [string, string[]] =
      this.platform === "win32" ? ["taskkill", ["/F", "/IM", name]] : ["pkill", ["-x", name]];

    try {
      await this.run(file, args, { timeoutMs: this.stopTimeoutMs });
      this.logger.verboseLog(`Terminated stray ${name} processes`);
    } catch (error) {
      // Both tools exit non-zero when nothing matched
      this.logger.verboseLog(`No stray ${name} processes terminated (${describeError(error)})`);
    }
  }

  private async stop(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;

    if (!handle) {
      return;
    }

    if (handle.hasExited) {
      this.logger.info("Media server was already stopped.");
      return;
    }

    handle.stopping = true;

    try {
      await this.run(this.executablePath, ["-p", this.directory, "-s", "stop"], {
        cwd: this.directory,
        timeoutMs: this.stopTimeoutMs,
      });
    } catch (error) {
      this.logger.warn(`Error stopping media server gracefully: ${describeError(error)}`);
    }

    const exited = await withTimeout(
      handle.exited.then(() => true),
      this.stopTimeoutMs,
    );

    if (!exited) {
      this.logger.warn("Media server did not stop in time, terminating.");
      try {
        handle.child.kill("SIGKILL");
      } catch (error) {
        this.logger.warn(`Failed to terminate media server: ${describeError(error)}`);
      }
      await withTimeout(handle.exited, this.stopTimeoutMs);
    }

    this.logger.info("Media server stopped.");
  }
}
