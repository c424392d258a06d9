import path from "path";
import fs from "fs-extra";
import type { ChannelConfig, ChannelState, LogLevel, SupervisorEvent } from "./types.js";
import type { Logger } from "./utils/logger.js";
import type { DependentService } from "./mediaServer.js";
import { ChannelProcess, type ChannelProcessEvent } from "./channel.js";
import { buildEncoderCommand, formatCommandLine, isStreamArtifact } from "./encoder.js";
import { parseChannelConfig, toChannelSlug } from "./config.js";
import type { ProcessSpawner } from "./pipes.js";
import { Mutex } from "./utils/mutex.js";
import { executableExists } from "./utils/paths.js";
import {
  ChannelBusyError,
  DeviceInUseError,
  DuplicateChannelError,
  InvalidChannelConfigError,
  IoFailureError,
  MissingExecutableError,
  ProcessLaunchError,
  UnknownChannelError,
  describeError,
} from "./errors.js";

export const LOG_TAIL_SIZE = 200;

export type SupervisorListener = (event: SupervisorEvent) => void;

export interface SupervisorOptions {
  encoderPath: string;
  outputRoot: string;
  mediaServer: DependentService;
  logger: Logger;
  spawner?: ProcessSpawner;
  stopGraceMs?: number;
  logTailSize?: number;
}

export interface AutoStartResult {
  channelName: string;
  started: boolean;
  error?: unknown;
}

interface ChannelEntry {
  state: ChannelState;
  process: ChannelProcess;
  // Whether this channel currently counts towards the media server's references
  holdsServiceRef: boolean;
  // Bumped on every start so a late exit from an earlier run is not mistaken for the current one
  runId: number;
}

const isNotFound = (error: Error): boolean => "code" in error && error.code === "ENOENT";

const copyState = (state: ChannelState): ChannelState => ({
  ...state,
  config: { ...state.config },
  status: { ...state.status },
  logTail: [...state.logTail],
});

/**
 * Owns every channel, arbitrates capture devices between them and keeps the shared media
 * server alive while at least one channel is live.
 *
 * All state changes go through one mutex, so the "is this device free?" check and the start
 * that claims the device happen as one step even when starts are requested concurrently.
 */
export class Supervisor {
  private readonly encoderPath: string;
  private readonly outputRoot: string;
  private readonly mediaServer: DependentService;
  private readonly logger: Logger;
  private readonly spawner: ProcessSpawner | undefined;
  private readonly stopGraceMs: number | undefined;
  private readonly logTailSize: number;
  private readonly channels = new Map<string, ChannelEntry>();
  private readonly listeners = new Set<SupervisorListener>();
  private readonly mutex = new Mutex();

  constructor(options: SupervisorOptions) {
    this.encoderPath = options.encoderPath;
    this.outputRoot = options.outputRoot;
    this.mediaServer = options.mediaServer;
    this.logger = options.logger;
    this.spawner = options.spawner;
    this.stopGraceMs = options.stopGraceMs;
    this.logTailSize = options.logTailSize ?? LOG_TAIL_SIZE;
  }

  subscribe(listener: SupervisorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listChannels(): ChannelState[] {
    return [...this.channels.values()].map((entry) => copyState(entry.state));
  }

  getChannel(channelName: string): ChannelState | undefined {
    const entry = this.channels.get(toChannelSlug(channelName));
    return entry ? copyState(entry.state) : undefined;
  }

  async addChannel(config: ChannelConfig): Promise<ChannelState> {
    return this.mutex.runExclusive(() => copyState(this.insertChannel(config).state));
  }

  async removeChannel(channelName: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      const entry = this.requireEntry(channelName);
      const { status } = entry.state;

      if (status.state !== "idle" || entry.process.isActive) {
        throw new ChannelBusyError(entry.state.config.channelName, status.state);
      }

      this.channels.delete(entry.state.slug);
      this.logger.verboseLog(`Removed channel '${entry.state.config.channelName}'`);
    });
  }

  /**
   * Start a channel's encoder. Fails with DependentServiceUnavailable, DeviceInUse,
   * MissingExecutable, InvalidChannelConfig, IoFailure or ProcessLaunchFailure; on every
   * failure the media server reference taken for this start is given back.
   */
  async startChannel(channelName: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const entry = this.requireEntry(channelName);
      const { config } = entry.state;

      if (entry.process.isActive) {
        this.logger.verboseLog(`Channel '${config.channelName}' is already running`);
        return;
      }

      await this.mediaServer.acquire();
      entry.holdsServiceRef = true;

      try {
        if (config.videoDeviceId) {
          const owner = this.isDeviceInUse(config.videoDeviceId, config.channelName);
          if (owner !== undefined) {
            throw new DeviceInUseError(config.videoDeviceId, owner);
          }
        }

        await this.prepareOutputDir(entry);

        if (!(await executableExists(this.encoderPath))) {
          throw new MissingExecutableError(this.encoderPath);
        }

        const command = buildEncoderCommand(config, this.encoderPath, entry.state.outputDir);
        this.logger.verboseLog(`[${config.channelName}] ${formatCommandLine(command.command, command.args)}`);

        entry.runId += 1;
        entry.state.lastExitCode = undefined;
        this.emitLog(config.channelName, "info", "Starting stream...");

        const launch = await entry.process.start(command);

        if (!launch.launched) {
          if (isNotFound(launch.error)) {
            throw new MissingExecutableError(this.encoderPath, { cause: launch.error });
          }
          throw new ProcessLaunchError(`encoder for channel '${config.channelName}'`, launch.error);
        }
        if (!entry.process.isActive) {
          throw new ProcessLaunchError(
            `encoder for channel '${config.channelName}'`,
            new Error(`exited at once with code ${entry.state.lastExitCode ?? "unknown"}`),
          );
        }
      } catch (error) {
        await this.releaseServiceRef(entry);
        throw error;
      }
    });
  }

  /** Best-effort stop; never rejects. Stopping an idle channel does nothing. */
  async stopChannel(channelName: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const entry = this.channels.get(toChannelSlug(channelName));
      if (!entry) {
        this.logger.warn(`Cannot stop unknown channel '${channelName}'`);
        return;
      }

      const wasLive = entry.process.isActive || entry.holdsServiceRef;

      try {
        await entry.process.stop();
      } catch (error) {
        this.logger.error(`Error stopping channel '${entry.state.config.channelName}': ${describeError(error)}`);
      }

      if (!wasLive) {
        return;
      }

      await this.cleanArtifacts(entry);
      await this.releaseServiceRef(entry);
    });
  }

  /** Name of the live (starting or running) channel holding `altId`, if any. */
  isDeviceInUse(altId: string, excludingChannel?: string): string | undefined {
    const excluded = excludingChannel === undefined ? undefined : toChannelSlug(excludingChannel);

    for (const entry of this.channels.values()) {
      if (entry.state.slug === excluded) {
        continue;
      }
      const { state } = entry.state.status;
      if ((state === "running" || state === "starting") && entry.state.config.videoDeviceId === altId) {
        return entry.state.config.channelName;
      }
    }

    return undefined;
  }

  snapshot(): ChannelConfig[] {
    return [...this.channels.values()].map((entry) => ({ ...entry.state.config }));
  }

  /** Replace the channel set with `configs`, all idle. Nothing is started. */
  async restore(configs: ChannelConfig[]): Promise<void> {
    await this.mutex.runExclusive(() => {
      const busy = [...this.channels.values()].find((entry) => entry.process.isActive);
      if (busy) {
        throw new ChannelBusyError(busy.state.config.channelName, busy.state.status.state);
      }

      const previous = new Map(this.channels);
      this.channels.clear();

      try {
        for (const config of configs) {
          this.insertChannel(config);
        }
      } catch (error) {
        this.channels.clear();
        previous.forEach((entry, slug) => this.channels.set(slug, entry));
        throw error;
      }
    });
  }

  /**
   * Start every idle channel marked auto-start; one failure does not stop the others.
   * `isCancelled` is checked before each start.
   */
  async startAutoStartChannels(isCancelled: () => boolean = () => false): Promise<AutoStartResult[]> {
    const results: AutoStartResult[] = [];
    const candidates = [...this.channels.values()].filter(
      (entry) => entry.state.config.autoStart && !entry.process.isActive,
    );

    if (candidates.length > 0) {
      this.logger.info("Checking for auto-start streams...");
    }

    for (const entry of candidates) {
      if (isCancelled()) {
        break;
      }
      const { channelName } = entry.state.config;
      try {
        // eslint-disable-next-line no-await-in-loop
        await this.startChannel(channelName);
        results.push({ channelName, started: true });
      } catch (error) {
        this.logger.error(`Auto-start of channel '${channelName}' failed: ${describeError(error)}`);
        results.push({ channelName, started: false, error });
      }
    }

    return results;
  }

  /** Stop every live channel, then the media server. Failures are logged, never thrown. */
  async shutdown(): Promise<void> {
    const live = [...this.channels.values()].filter((entry) => entry.process.isActive || entry.holdsServiceRef);

    for (const entry of live) {
      try {
        // eslint-disable-next-line no-await-in-loop
        await this.stopChannel(entry.state.config.channelName);
      } catch (error) {
        this.logger.error(`Failed to stop channel '${entry.state.config.channelName}': ${describeError(error)}`);
      }
    }

    try {
      await this.mutex.runExclusive(() => this.mediaServer.shutdown());
    } catch (error) {
      this.logger.error(`Failed to stop media server: ${describeError(error)}`);
    }
  }

  private insertChannel(input: ChannelConfig): ChannelEntry {
    const parsed = parseChannelConfig(input);
    if (!parsed.success) {
      throw new InvalidChannelConfigError(parsed.message);
    }

    const config = parsed.data;
    const slug = toChannelSlug(config.channelName);
    const existing = this.channels.get(slug);
    if (existing) {
      throw new DuplicateChannelError(config.channelName, existing.state.config.channelName);
    }

    const entry: ChannelEntry = {
      state: {
        config,
        slug,
        outputDir: path.join(this.outputRoot, slug),
        status: { state: "idle" },
        logTail: [],
      },
      holdsServiceRef: false,
      runId: 0,
      process: new ChannelProcess({
        description: `encoder for '${config.channelName}'`,
        spawner: this.spawner,
        stopGraceMs: this.stopGraceMs,
        onEvent: (event) => this.onProcessEvent(entry, event),
      }),
    };

    this.channels.set(slug, entry);
    return entry;
  }

  private requireEntry(channelName: string): ChannelEntry {
    const entry = this.channels.get(toChannelSlug(channelName));
    if (!entry) {
      throw new UnknownChannelError(channelName);
    }
    return entry;
  }

  private onProcessEvent(entry: ChannelEntry, event: ChannelProcessEvent): void {
    const source = entry.state.config.channelName;

    switch (event.type) {
      case "log":
        this.emitLog(source, event.level, event.message);
        break;
      case "status":
        entry.state.status = event.status;
        this.emit({ type: "status", source, status: event.status, timestamp: new Date() });
        break;
      case "exit": {
        entry.state.lastExitCode = event.exitCode;
        this.emit({ type: "exit", source, exitCode: event.exitCode, requested: event.requested, timestamp: new Date() });
        if (!event.requested) {
          const { runId } = entry;
          this.onSpontaneousExit(entry, runId).catch((error: unknown) => {
            this.logger.error(`Cleanup after channel '${source}' exited failed: ${describeError(error)}`);
          });
        }
        break;
      }
      default:
        break;
    }
  }

  // The encoder ended without a stop request: free what its start claimed
  private async onSpontaneousExit(entry: ChannelEntry, runId: number): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (entry.runId !== runId || entry.process.isActive || !entry.holdsServiceRef) {
        return;
      }
      await this.cleanArtifacts(entry);
      await this.releaseServiceRef(entry);
    });
  }

  private async releaseServiceRef(entry: ChannelEntry): Promise<void> {
    if (!entry.holdsServiceRef) {
      return;
    }
    entry.holdsServiceRef = false;

    try {
      await this.mediaServer.release();
    } catch (error) {
      this.logger.error(`Failed to release media server: ${describeError(error)}`);
    }
  }

  private async prepareOutputDir(entry: ChannelEntry): Promise<void> {
    try {
      await fs.ensureDir(entry.state.outputDir);
      await this.removeArtifacts(entry.state.outputDir);
    } catch (error) {
      throw new IoFailureError(`Error creating directory ${entry.state.outputDir}`, error);
    }
  }

  private async cleanArtifacts(entry: ChannelEntry): Promise<void> {
    try {
      const removed = await this.removeArtifacts(entry.state.outputDir);
      this.logger.verboseLog(`Removed ${removed} stale file(s) from ${entry.state.outputDir}`);
    } catch (error) {
      this.logger.warn(`Could not clean ${entry.state.outputDir}: ${describeError(error)}`);
    }
  }

  private async removeArtifacts(directory: string): Promise<number> {
    if (!(await fs.pathExists(directory))) {
      return 0;
    }

    const files = (await fs.readdir(directory)).filter(isStreamArtifact);
    for (const file of files) {
      // eslint-disable-next-line no-await-in-loop
      await fs.remove(path.join(directory, file));
    }
    return files.length;
  }

  private emitLog(source: string, level: LogLevel, message: string): void {
    const entry = this.channels.get(toChannelSlug(source));
    if (entry) {
      entry.state.logTail.push(message);
      if (entry.state.logTail.length > this.logTailSize) {
        entry.state.logTail.splice(0, entry.state.logTail.length - this.logTailSize);
      }
    }
    this.emit({ type: "log", source, level, message, timestamp: new Date() });
  }

  private emit(event: SupervisorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn(`Event listener failed: ${describeError(error)}`);
      }
    }
  }
}
