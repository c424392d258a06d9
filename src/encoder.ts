import path from "path";
import type { ChannelConfig, CommandSpec } from "./types.js";
import { InvalidChannelConfigError } from "./errors.js";

export const SEGMENT_SECONDS = 2;
export const PLAYLIST_SIZE = 6;
export const AUDIO_SAMPLE_RATE = 44_100;
export const PLAYLIST_FILE_NAME = "index.m3u8";
export const SEGMENT_FILE_PATTERN = "segment_%d.ts";

const frameSizePattern = /^(\d+)x(\d+)$/;

/**
 * Quote arguments so the logged command can be pasted into a shell as-is.
 * spawn() receives the raw argument array and needs none of this.
 */
export const formatCommandLine = (command: string, args: string[]): string => {
  const quote = (arg: string): string => {
    if (arg === "") {
      return '""';
    }
    if (/^[\w@%+=:,./\\-]+$/.test(arg)) {
      return arg;
    }
    return `"${arg.replace(/"/g, '\\"')}"`;
  };

  return [command, ...args].map(quote).join(" ");
};

const scaleFilter = (frameSize: string): string | undefined => {
  const trimmed = frameSize.trim();
  if (!trimmed) {
    return undefined;
  }
  const match = frameSizePattern.exec(trimmed);
  if (!match) {
    throw new InvalidChannelConfigError(`Frame size '${frameSize}' must look like 1280x720`);
  }
  return `scale=${match[1]}:${match[2]}:flags=lanczos`;
};

/**
 * Derive the full ffmpeg invocation for one channel: DirectShow capture, low-latency H.264
 * and AAC, written as a rolling HLS playlist into `outputDir`.
 *
 * Keyframes are forced every two seconds (`-g` and `-keyint_min` both 2 × framerate) so that
 * every segment boundary lands on a keyframe and each segment decodes on its own.
 */
export const buildEncoderCommand = (config: ChannelConfig, encoderPath: string, outputDir: string): CommandSpec => {
  const videoDevice = config.videoDeviceId?.trim();
  const audioDevice = config.audioDeviceId?.trim();

  if (!videoDevice) {
    throw new InvalidChannelConfigError(`Channel '${config.channelName}' has no video device selected`);
  }

  const gop = config.framerate * 2;
  const videoBitrate = `${config.videoBitrateKbps}k`;
  const bufferSize = `${config.videoBitrateKbps * 2}k`;
  const input = audioDevice ? `video=${videoDevice}:audio=${audioDevice}` : `video=${videoDevice}`;

  const args = [
    "-hide_banner",
    "-loglevel",
    "info",
    "-f",
    "dshow",
    "-rtbufsize",
    "512M",
    "-framerate",
    String(config.framerate),
    "-thread_queue_size",
    "1024",
    "-i",
    input,
    "-map",
    "0:v:0",
  ];

  if (audioDevice) {
    args.push("-map", "0:a:0");
  }

  args.push(
    "-c:v",
    "libx264",
    "-preset",
    "superfast",
    "-tune",
    "zerolatency",
    "-profile:v",
    "baseline",
    "-level",
    "3.1",
    "-pix_fmt",
    "yuv420p",
    "-fps_mode",
    "cfr",
  );

  const filter = scaleFilter(config.frameSize);
  if (filter) {
    args.push("-vf", filter);
  }

  args.push(
    "-b:v",
    videoBitrate,
    "-maxrate",
    videoBitrate,
    "-bufsize",
    bufferSize,
    "-g",
    String(gop),
    "-keyint_min",
    String(gop),
  );

  if (audioDevice) {
    args.push("-c:a", "aac", "-b:a", `${config.audioBitrateKbps}k`, "-ar", String(AUDIO_SAMPLE_RATE));
  }

  const segmentPattern = path.join(outputDir, SEGMENT_FILE_PATTERN);
  const playlistPath = path.join(outputDir, PLAYLIST_FILE_NAME);

  args.push(
    "-f",
    "hls",
    "-hls_time",
    String(SEGMENT_SECONDS),
    "-hls_list_size",
    String(PLAYLIST_SIZE),
    "-hls_flags",
    "delete_segments+program_date_time+independent_segments",
    "-hls_segment_filename",
    segmentPattern,
    playlistPath,
  );

  return { command: encoderPath, args, playlistPath, segmentPattern };
};

/** Files the encoder leaves behind in a channel directory. */
export const isStreamArtifact = (fileName: string): boolean => fileName.endsWith(".ts") || fileName.endsWith(".m3u8");
