import { EventEmitter } from "events";
import path from "path";
import fs from "fs-extra";
import { describe, expect, it, vi } from "vitest";
import { CONFIG_FILE_NAME } from "../src/config.js";
import type { ProcessSpawner } from "../src/pipes.js";
import { type ShutdownTrigger, listenForShutdownSignals, printEvent, runRuntimeLoop } from "../src/runtime.js";
import { Supervisor } from "../src/supervisor.js";
import type { AppConfig, ChannelConfig, SupervisorEvent } from "../src/types.js";
import { Logger } from "../src/utils/logger.js";
import { FakeService, channelConfig, fakeSpawner, makeTempDir, quietLogger } from "./helpers.js";

const timestamp = new Date(0);

const setup = () => {
  const logger = quietLogger();
  const channel = vi.spyOn(logger, "channel").mockImplementation(() => {});
  return { logger, channel };
};

describe("printEvent", () => {
  it("writes channel output at its level", () => {
    const { logger, channel } = setup();

    printEvent({ type: "log", source: "Lobby", level: "warn", message: "buffer full", timestamp }, logger);

    expect(channel).toHaveBeenCalledWith("Lobby", "warn", "buffer full");
  });

  it("announces a channel that starts streaming", () => {
    const { logger, channel } = setup();

    printEvent({ type: "status", source: "Lobby", status: { state: "running" }, timestamp }, logger);

    expect(channel).toHaveBeenCalledWith("Lobby", "verbose", "status: running");
    expect(logger.success).toHaveBeenCalledWith("[Lobby] Streaming");
  });

  it("labels a failed status with its exit code", () => {
    const { logger, channel } = setup();

    printEvent({ type: "status", source: "Lobby", status: { state: "failed", exitCode: 3 }, timestamp }, logger);

    expect(channel).toHaveBeenCalledWith("Lobby", "verbose", "status: failed (exit code 3)");
    expect(logger.success).not.toHaveBeenCalled();
  });

  it("warns only about unrequested non-zero exits", () => {
    const { logger, channel } = setup();
    const exits: SupervisorEvent[] = [
      { type: "exit", source: "A", exitCode: 1, requested: false, timestamp },
      { type: "exit", source: "B", exitCode: -1, requested: true, timestamp },
      { type: "exit", source: "C", exitCode: 0, requested: false, timestamp },
    ];

    exits.forEach((event) => printEvent(event, logger));

    expect(channel.mock.calls).toEqual([["A", "warn", "encoder exited unexpectedly with code 1"]]);
  });
});

describe("Logger.channel", () => {
  it("routes by level and hides verbose lines unless enabled", () => {
    const logger = new Logger(false);
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(logger, "error").mockImplementation(() => {});

    logger.channel("Lobby", "verbose", "frame=1");
    logger.channel("Lobby", "error", "Could not open device");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toContain("Could not open device");
    log.mockRestore();
  });
});

interface LoopSetupOptions {
  channels: ChannelConfig[];
  requestedAtStart?: boolean;
  requestOnFirstSpawn?: boolean;
}

const setupLoop = async ({ channels, requestedAtStart = false, requestOnFirstSpawn = false }: LoopSetupOptions) => {
  const dir = await makeTempDir();
  const configPath = path.join(dir, CONFIG_FILE_NAME);
  const config: AppConfig = {
    encoderPath: "ffmpeg",
    mediaServer: { directory: path.join(dir, "nginx"), executable: "nginx" },
    outputRoot: path.join(dir, "hls"),
    channels,
  };

  let requested = requestedAtStart;
  const wait = vi.fn(async () => {});
  const dispose = vi.fn();
  const shutdown: ShutdownTrigger = {
    get requested() {
      return requested;
    },
    wait,
    dispose,
  };

  const service = new FakeService();
  const encoders = fakeSpawner({ quitOnQ: true });
  const spawner: ProcessSpawner = (command, args, options) => {
    if (requestOnFirstSpawn) {
      requested = true;
    }
    return encoders.spawner(command, args, options);
  };
  const logger = quietLogger();
  const createSupervisor = (loaded: AppConfig, log: Logger) =>
    new Supervisor({
      encoderPath: loaded.encoderPath,
      outputRoot: loaded.outputRoot,
      mediaServer: service,
      logger: log,
      spawner,
      stopGraceMs: 200,
    });

  return { config, configPath, logger, shutdown, wait, dispose, service, calls: encoders.calls, createSupervisor };
};

describe("runRuntimeLoop", () => {
  it("starts auto-start and named channels, then stops them and saves on shutdown", async () => {
    const channels = [channelConfig("A", { autoStart: true }), channelConfig("B"), channelConfig("C")];
    const { config, configPath, logger, shutdown, wait, dispose, service, calls, createSupervisor } = await setupLoop({
      channels,
    });

    await runRuntimeLoop(config, logger, { configPath, startChannels: ["B"], shutdown, createSupervisor });

    expect(calls.map((call) => call.args.at(-1))).toEqual([
      path.join(config.outputRoot, "a", "index.m3u8"),
      path.join(config.outputRoot, "b", "index.m3u8"),
    ]);
    expect(calls.map((call) => call.process.input)).toEqual([["q\n"], ["q\n"]]);
    expect(wait).toHaveBeenCalledTimes(1);
    expect(dispose).toHaveBeenCalledTimes(1);
    expect(service.activeChannelCount).toBe(0);
    expect(service.stops).toBe(1);
    const saved: AppConfig = await fs.readJSON(configPath);
    expect(saved.channels).toEqual(channels);
  });

  it("starts nothing when shutdown is already requested", async () => {
    const channels = [channelConfig("A", { autoStart: true })];
    const { config, configPath, logger, shutdown, wait, calls, createSupervisor } = await setupLoop({
      channels,
      requestedAtStart: true,
    });

    await runRuntimeLoop(config, logger, { configPath, startChannels: ["A"], shutdown, createSupervisor });

    expect(calls).toHaveLength(0);
    expect(wait).not.toHaveBeenCalled();
    expect(await fs.pathExists(configPath)).toBe(true);
  });

  it("stops launching channels once a shutdown arrives mid-way", async () => {
    const channels = [channelConfig("A", { autoStart: true }), channelConfig("B", { autoStart: true })];
    const { config, configPath, logger, shutdown, service, calls, createSupervisor } = await setupLoop({
      channels,
      requestOnFirstSpawn: true,
    });

    await runRuntimeLoop(config, logger, { configPath, startChannels: ["B"], shutdown, createSupervisor });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.process.input).toEqual(["q\n"]);
    expect(service.launches).toBe(1);
    expect(service.activeChannelCount).toBe(0);
  });
});

describe("listenForShutdownSignals", () => {
  it("records the first signal and stops listening once disposed", async () => {
    const logger = quietLogger();
    const source = new EventEmitter();
    const shutdown = listenForShutdownSignals(logger, source);

    expect(shutdown.requested).toBe(false);
    source.emit("SIGTERM", "SIGTERM");
    source.emit("SIGINT", "SIGINT");
    await shutdown.wait();

    expect(shutdown.requested).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Received SIGTERM. Stopping all channels.");

    shutdown.dispose();
    expect(source.listenerCount("SIGTERM")).toBe(0);
    expect(source.listenerCount("SIGINT")).toBe(0);
  });
});
