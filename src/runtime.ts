import path from "path";
import type { AppConfig, SupervisorEvent } from "./types.js";
import type { Logger } from "./utils/logger.js";
import { MediaServer } from "./mediaServer.js";
import { Supervisor } from "./supervisor.js";
import { saveConfig } from "./config.js";
import { describeError } from "./errors.js";
import { PLAYLIST_FILE_NAME } from "./encoder.js";

export interface RuntimeLoopOptions {
  configPath: string;
  startChannels?: string[];
  shutdown?: ShutdownTrigger;
  createSupervisor?: (config: AppConfig, logger: Logger) => Supervisor;
}

export const createSupervisor = (config: AppConfig, logger: Logger): Supervisor => {
  const mediaServer = new MediaServer({ ...config.mediaServer, logger });
  return new Supervisor({
    encoderPath: config.encoderPath,
    outputRoot: config.outputRoot,
    mediaServer,
    logger,
  });
};

/** Render supervisor events on the console, one line per event. */
export const printEvent = (event: SupervisorEvent, logger: Logger): void => {
  switch (event.type) {
    case "log":
      logger.channel(event.source, event.level, event.message);
      break;
    case "status": {
      const { status } = event;
      const label = status.state === "failed" ? `failed (exit code ${status.exitCode})` : status.state;
      logger.channel(event.source, "verbose", `status: ${label}`);
      if (status.state === "running") {
        logger.success(`[${event.source}] Streaming`);
      }
      break;
    }
    case "exit":
      if (!event.requested && event.exitCode !== 0) {
        logger.channel(event.source, "warn", `encoder exited unexpectedly with code ${event.exitCode}`);
      }
      break;
    default:
      break;
  }
};

/** Flags a requested shutdown; `wait()` settles once one arrives. */
export interface ShutdownTrigger {
  readonly requested: boolean;
  wait(): Promise<void>;
  dispose(): void;
}

interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export const listenForShutdownSignals = (logger: Logger, source: SignalSource = process): ShutdownTrigger => {
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  let requested = false;
  let notify: () => void = () => {};
  const arrived = new Promise<void>((resolve) => {
    notify = resolve;
  });

  const handleSignal = (signal: NodeJS.Signals) => {
    if (!requested) {
      logger.warn(`Received ${signal}. Stopping all channels.`);
    }
    requested = true;
    notify();
  };

  signals.forEach((signal) => source.on(signal, handleSignal));

  return {
    get requested() {
      return requested;
    },
    wait: () => arrived,
    dispose: () => signals.forEach((signal) => source.off(signal, handleSignal)),
  };
};

export const runRuntimeLoop = async (config: AppConfig, logger: Logger, options: RuntimeLoopOptions): Promise<void> => {
  const shutdown = options.shutdown ?? listenForShutdownSignals(logger);
  const supervisor = (options.createSupervisor ?? createSupervisor)(config, logger);
  const unsubscribe = supervisor.subscribe((event) => printEvent(event, logger));

  let restored = false;

  logger.info(`Serving HLS output from ${config.outputRoot}`);

  try {
    await supervisor.restore(config.channels);
    restored = true;
    await supervisor.startAutoStartChannels(() => shutdown.requested);

    for (const channelName of options.startChannels ?? []) {
      if (shutdown.requested) {
        break;
      }
      try {
        // eslint-disable-next-line no-await-in-loop
        await supervisor.startChannel(channelName);
      } catch (error) {
        logger.error(`Could not start channel '${channelName}': ${describeError(error)}`);
      }
    }

    if (!shutdown.requested) {
      const live = supervisor.listChannels().filter((channel) => channel.status.state === "running");
      if (live.length === 0) {
        logger.warn("No channel is streaming. Use --help to see how to start one.");
      }
      for (const channel of live) {
        logger.info(`  ${channel.config.channelName}: ${path.join(channel.outputDir, PLAYLIST_FILE_NAME)}`);
      }

      logger.success("Channel manager is active. Press Ctrl+C to stop.");
      await shutdown.wait();
    }

    logger.info("Shutdown requested, cleaning up resources.");
  } finally {
    await supervisor.shutdown();
    unsubscribe();
    shutdown.dispose();

    if (restored) {
      try {
        await saveConfig(options.configPath, { ...config, channels: supervisor.snapshot() });
        logger.verboseLog(`Configuration saved to ${options.configPath}`);
      } catch (error) {
        logger.error(`Error saving config: ${describeError(error)}`);
      }
    }
  }
};
