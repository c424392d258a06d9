#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import path from "path";
import fs from "fs-extra";

import { loadConfig, saveConfig, getDefaultConfigPath, toChannelSlug, type LoadedConfig } from "./config.js";
import { listDevices } from "./devices.js";
import { promptForChannel } from "./setup.js";
import { runRuntimeLoop } from "./runtime.js";
import type { AppConfig, RuntimeOptions } from "./types.js";
import { Logger } from "./utils/logger.js";
import { UnknownChannelError, describeError } from "./errors.js";

const pkgUrl = new URL("../package.json", import.meta.url);
const pkg: { version: string } = fs.readJSONSync(pkgUrl);

interface CommandContext {
  logger: Logger;
  configPath: string;
  loaded: LoadedConfig;
}

const resolveContext = async (options: RuntimeOptions): Promise<CommandContext> => {
  const logger = new Logger(options.verbose);
  const configPath = options.config ? path.resolve(options.config) : getDefaultConfigPath(process.cwd());

  logger.verboseLog(`Using configuration file: ${configPath}`);

  const loaded = await loadConfig(configPath);
  loaded.notes.forEach((note) => (loaded.fromFile ? logger.warn(note) : logger.verboseLog(note)));

  return { logger, configPath, loaded };
};

const handleAddChannel = async (config: AppConfig, configPath: string, logger: Logger): Promise<AppConfig> => {
  logger.info("Looking for capture devices...");
  const devices = await listDevices(config.encoderPath);

  if (devices.videoDevices.length === 0) {
    logger.warn("No video capture devices found.");
    logger.verboseLog(devices.rawDiagnosticText);
  }

  const channel = await promptForChannel(
    devices,
    config.channels.map((existing) => existing.channelName),
  );

  const updated: AppConfig = { ...config, channels: [...config.channels, channel] };
  await saveConfig(configPath, updated);

  logger.info(`Channel '${channel.channelName}' saved to ${configPath}`);
  return updated;
};

const createProgram = (): Command => {
  const program = new Command();

  program
    .name("hls-channel-manager")
    .description("Run capture devices as HLS channels: one ffmpeg encoder per channel behind a shared nginx")
    .version(pkg.version)
    .option("-c, --config <path>", "Path to configuration file", "")
    .option("-v, --verbose", "Enable verbose logging", false);

  program
    .command("run", { isDefault: true })
    .description("Start auto-start channels (and any named ones) and supervise them until Ctrl+C")
    .argument("[channels...]", "Additional channels to start")
    .action(async (channels: string[]) => {
      const { logger, configPath, loaded } = await resolveContext(program.opts<RuntimeOptions>());
      let { config } = loaded;

      if (config.channels.length === 0) {
        logger.warn("No channels configured. Starting initial setup.");
        config = await handleAddChannel(config, configPath, logger);
      }

      await runRuntimeLoop(config, logger, { configPath, startChannels: channels });
    });

  program
    .command("devices")
    .description("List the capture devices the encoder can see")
    .option("--raw", "Also print the encoder's raw device listing", false)
    .action(async (options: { raw: boolean }) => {
      const { logger, loaded } = await resolveContext(program.opts<RuntimeOptions>());
      const devices = await listDevices(loaded.config.encoderPath);

      console.log(chalk.bold("Video devices:"));
      devices.videoDevices.forEach((device, index) => console.log(`  ${index + 1}. ${device.name}  ${chalk.gray(device.altId)}`));
      console.log(chalk.bold("Audio devices:"));
      devices.audioDevices.forEach((device, index) => console.log(`  ${index + 1}. ${device.name}  ${chalk.gray(device.altId)}`));

      if (devices.videoDevices.length === 0 && devices.audioDevices.length === 0) {
        logger.warn(devices.rawDiagnosticText);
      } else if (options.raw) {
        console.log(devices.rawDiagnosticText);
      }
    });

  program
    .command("channels")
    .description("List configured channels and their output folders")
    .action(async () => {
      const { loaded } = await resolveContext(program.opts<RuntimeOptions>());
      const { config } = loaded;

      if (config.channels.length === 0) {
        console.log("No channels configured.");
        return;
      }

      for (const channel of config.channels) {
        const slug = toChannelSlug(channel.channelName);
        const auto = channel.autoStart ? chalk.green(" [auto-start]") : "";
        console.log(`${chalk.bold(channel.channelName)}${auto}`);
        console.log(`  video: ${channel.videoDeviceLabel || channel.videoDeviceId || "(none)"}`);
        console.log(`  audio: ${channel.audioDeviceLabel || channel.audioDeviceId || "(none)"}`);
        console.log(
          `  ${channel.frameSize || "capture size"} @ ${channel.framerate} fps, ${channel.videoBitrateKbps}k video / ${channel.audioBitrateKbps}k audio`,
        );
        console.log(`  output: ${path.join(config.outputRoot, slug)}`);
      }
    });

  program
    .command("add-channel")
    .description("Interactively add a channel")
    .action(async () => {
      const { logger, configPath, loaded } = await resolveContext(program.opts<RuntimeOptions>());
      await handleAddChannel(loaded.config, configPath, logger);
    });

  program
    .command("remove-channel")
    .description("Remove a channel from the configuration")
    .argument("<name>", "Channel name")
    .action(async (name: string) => {
      const { logger, configPath, loaded } = await resolveContext(program.opts<RuntimeOptions>());
      const slug = toChannelSlug(name);
      const remaining = loaded.config.channels.filter((channel) => toChannelSlug(channel.channelName) !== slug);

      if (remaining.length === loaded.config.channels.length) {
        throw new UnknownChannelError(name);
      }

      await saveConfig(configPath, { ...loaded.config, channels: remaining });
      logger.info(`Channel '${name}' removed`);
    });

  return program;
};

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
});
