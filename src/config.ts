import { z } from "zod";
import fs from "fs-extra";
import path from "path";
import type { AppConfig, ChannelConfig } from "./types.js";
import { IoFailureError } from "./errors.js";
import { lastPathSegment, parentPath } from "./utils/paths.js";

export const CONFIG_FILE_NAME = "channel-manager.json";

// Folder name the first releases appended to the HLS root by mistake
const LEGACY_CHANNEL_FOLDER = "channel1";

export const CHANNEL_DEFAULTS = {
  videoDeviceLabel: "",
  audioDeviceLabel: "",
  frameSize: "1280x720",
  framerate: 30,
  videoBitrateKbps: 1200,
  audioBitrateKbps: 96,
  autoStart: false,
} as const;

/** Output folder name for a channel: lowercase with all whitespace removed. */
export const toChannelSlug = (channelName: string): string => channelName.replace(/\s+/g, "").toLowerCase();

export const channelConfigSchema = z
  .object({
    channelName: z.string().trim().min(1, "Channel name cannot be empty"),
    videoDeviceId: z.string().min(1).optional(),
    audioDeviceId: z.string().min(1).optional(),
    videoDeviceLabel: z.string().default(CHANNEL_DEFAULTS.videoDeviceLabel),
    audioDeviceLabel: z.string().default(CHANNEL_DEFAULTS.audioDeviceLabel),
    frameSize: z
      .string()
      .regex(/^(\d+x\d+)?$/, "Frame size must look like 1280x720, or be empty")
      .default(CHANNEL_DEFAULTS.frameSize),
    framerate: z.number().int().positive().default(CHANNEL_DEFAULTS.framerate),
    videoBitrateKbps: z.number().int().positive().default(CHANNEL_DEFAULTS.videoBitrateKbps),
    audioBitrateKbps: z.number().int().positive().default(CHANNEL_DEFAULTS.audioBitrateKbps),
    autoStart: z.boolean().default(CHANNEL_DEFAULTS.autoStart),
  })
  .superRefine((data, ctx) => {
    const slug = toChannelSlug(data.channelName);
    if (slug === "." || slug === ".." || /[\\/:*?"<>|]/.test(slug)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Channel name '${data.channelName}' cannot be used as a folder name`,
        path: ["channelName"],
      });
    }
  });

const configSchema = z
  .object({
    encoderPath: z.string().min(1),
    mediaServer: z.object({
      directory: z.string().min(1),
      executable: z.string().min(1),
    }),
    outputRoot: z.string().min(1),
    channels: z.array(channelConfigSchema).default([]),
  })
  .superRefine((data, ctx) => {
    const seen = new Map<string, string>();
    data.channels.forEach((channel, index) => {
      const slug = toChannelSlug(channel.channelName);
      const existing = seen.get(slug);
      if (existing !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Channel '${channel.channelName}' collides with '${existing}' (both use folder '${slug}')`,
          path: ["channels", index, "channelName"],
        });
      }
      seen.set(slug, channel.channelName);
    });
  });

export const defaultConfig = (platform: NodeJS.Platform = process.platform): AppConfig =>
  platform === "win32"
    ? {
        encoderPath: "C:\\ffmpeg\\bin\\ffmpeg.exe",
        mediaServer: { directory: "C:\\nginx", executable: "nginx.exe" },
        outputRoot: "C:\\hls",
        channels: [],
      }
    : {
        encoderPath: "ffmpeg",
        mediaServer: { directory: "/usr/local/nginx", executable: "sbin/nginx" },
        outputRoot: "/var/www/hls",
        channels: [],
      };

export const parseChannelConfig = (input: unknown): { success: true; data: ChannelConfig } | { success: false; message: string } => {
  const parsed = channelConfigSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, message: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { success: true, data: parsed.data };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const legacyString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() ? value.trim() : undefined;

// "1200k" → 1200, "30" → 30
const legacyNumber = (value: unknown, fallback: number): number => {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Convert the snake_case file written by the earlier desktop tool
 * (`ffmpeg_path`, `nginx_path`, `hls_path`, `streams`) into the current shape.
 */
export const upgradeLegacyConfig = (data: unknown, platform: NodeJS.Platform = process.platform): unknown => {
  if (!isRecord(data) || !("streams" in data || "ffmpeg_path" in data || "hls_path" in data)) {
    return data;
  }

  const defaults = defaultConfig(platform);
  const streams = Array.isArray(data.streams) ? data.streams.filter(isRecord) : [];

  return {
    encoderPath: legacyString(data.ffmpeg_path) ?? defaults.encoderPath,
    mediaServer: {
      directory: legacyString(data.nginx_path) ?? defaults.mediaServer.directory,
      executable: defaults.mediaServer.executable,
    },
    outputRoot: legacyString(data.hls_path) ?? defaults.outputRoot,
    channels: streams.map((stream) => ({
      channelName: legacyString(stream.channel_name) ?? "",
      videoDeviceId: legacyString(stream.video_device_alt),
      audioDeviceId: legacyString(stream.audio_device_alt),
      videoDeviceLabel: legacyString(stream.video_device_label) ?? CHANNEL_DEFAULTS.videoDeviceLabel,
      audioDeviceLabel: legacyString(stream.audio_device_label) ?? CHANNEL_DEFAULTS.audioDeviceLabel,
      frameSize: typeof stream.video_size === "string" ? stream.video_size.trim() : CHANNEL_DEFAULTS.frameSize,
      framerate: legacyNumber(stream.framerate, CHANNEL_DEFAULTS.framerate),
      videoBitrateKbps: legacyNumber(stream.video_bitrate, CHANNEL_DEFAULTS.videoBitrateKbps),
      audioBitrateKbps: legacyNumber(stream.audio_bitrate, CHANNEL_DEFAULTS.audioBitrateKbps),
      autoStart: stream.auto_start === true,
    })),
  };
};

/**
 * Early releases saved the first channel's folder (`C:\hls\channel1`) as the output root;
 * channel folders are created beneath the root, so strip it.
 */
export const fixLegacyOutputRoot = (config: AppConfig): string | undefined => {
  if (lastPathSegment(config.outputRoot).toLowerCase() !== LEGACY_CHANNEL_FOLDER) {
    return undefined;
  }

  const parent = parentPath(config.outputRoot);
  return parent && parent !== config.outputRoot ? parent : undefined;
};

export interface LoadedConfig {
  config: AppConfig;
  fromFile: boolean;
  notes: string[];
}

export const loadConfig = async (configPath: string, platform: NodeJS.Platform = process.platform): Promise<LoadedConfig> => {
  if (!(await fs.pathExists(configPath))) {
    return { config: defaultConfig(platform), fromFile: false, notes: ["No config file found, using default settings."] };
  }

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    throw new IoFailureError(`Failed to read configuration file ${configPath}`, error);
  }

  if (!raw.trim()) {
    throw new IoFailureError(`Configuration file ${configPath} is empty.`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new IoFailureError("Failed to parse configuration JSON", error);
  }

  const notes: string[] = [];
  const upgraded = upgradeLegacyConfig(data, platform);
  if (upgraded !== data) {
    notes.push("Converted configuration from the legacy format; it will be saved in the new format.");
  }

  const parsed = configSchema.safeParse(upgraded);

  if (!parsed.success) {
    throw new IoFailureError(`Invalid configuration file: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`);
  }

  const config: AppConfig = parsed.data;
  const fixedRoot = fixLegacyOutputRoot(config);
  if (fixedRoot) {
    notes.push(`Updated output root from legacy config to: ${fixedRoot}`);
    config.outputRoot = fixedRoot;
  }

  return { config, fromFile: true, notes };
};

export const saveConfig = async (configPath: string, config: AppConfig): Promise<void> => {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    throw new IoFailureError(`Failed to save configuration: ${parsed.error.message}`);
  }

  try {
    await fs.writeJSON(configPath, parsed.data, { spaces: 2 });
  } catch (error) {
    throw new IoFailureError(`Failed to write configuration file ${configPath}`, error);
  }
};

export const getDefaultConfigPath = (cwd: string): string => {
  return path.join(cwd, CONFIG_FILE_NAME);
};
