import inquirer from "inquirer";
import type { ChannelConfig, Device, DeviceList } from "./types.js";
import { CHANNEL_DEFAULTS, toChannelSlug } from "./config.js";

const NO_DEVICE = "";

const FRAME_SIZES = ["1920x1080", "1280x720", "854x480", "640x360"];
const FRAMERATES = [30, 25, 24, 15, 60];

interface DeviceChoice {
  name: string;
  value: string;
}

const deviceChoices = (devices: Device[], allowNone: boolean): DeviceChoice[] => {
  const choices = devices.map((device, index) => ({
    name: `${index + 1}. ${device.name}`,
    value: device.altId,
  }));
  return allowNone ? [...choices, { name: "(none)", value: NO_DEVICE }] : choices;
};

const labelFor = (devices: Device[], altId: string): string =>
  devices.find((device) => device.altId === altId)?.name ?? altId;

/**
 * Ask for everything a new channel needs. Device pickers are filled from `devices`; when the
 * backend found no video device the alternative name can be typed in.
 */
export const promptForChannel = async (devices: DeviceList, existingNames: string[]): Promise<ChannelConfig> => {
  const takenSlugs = new Set(existingNames.map(toChannelSlug));
  const defaultName = `Channel ${existingNames.length + 1}`;

  const { channelName } = await inquirer.prompt<{ channelName: string }>([
    {
      type: "input",
      name: "channelName",
      message: "Channel name:",
      default: defaultName,
      filter: (input: string) => input.trim(),
      validate: (input: string) => {
        if (!input.trim()) {
          return "Channel name cannot be empty";
        }
        if (takenSlugs.has(toChannelSlug(input))) {
          return `A channel using folder '${toChannelSlug(input)}' already exists`;
        }
        return true;
      },
    },
  ]);

  let videoDeviceId: string;
  if (devices.videoDevices.length > 0) {
    ({ videoDeviceId } = await inquirer.prompt<{ videoDeviceId: string }>([
      {
        type: "list",
        name: "videoDeviceId",
        message: "Video capture device:",
        choices: deviceChoices(devices.videoDevices, false),
      },
    ]));
  } else {
    ({ videoDeviceId } = await inquirer.prompt<{ videoDeviceId: string }>([
      {
        type: "input",
        name: "videoDeviceId",
        message: "No video devices were found. Enter the device's alternative name:",
        validate: (input: string) => (input.trim() ? true : "A video device is required"),
      },
    ]));
  }

  const { audioDeviceId } = await inquirer.prompt<{ audioDeviceId: string }>([
    {
      type: "list",
      name: "audioDeviceId",
      message: "Audio capture device:",
      choices: deviceChoices(devices.audioDevices, true),
    },
  ]);

  const answers = await inquirer.prompt<{
    frameSize: string;
    framerate: number;
    videoBitrateKbps: number;
    audioBitrateKbps: number;
    autoStart: boolean;
  }>([
    {
      type: "list",
      name: "frameSize",
      message: "Output frame size:",
      choices: [...FRAME_SIZES, { name: "Keep capture size", value: "" }],
      default: CHANNEL_DEFAULTS.frameSize,
    },
    {
      type: "list",
      name: "framerate",
      message: "Frame rate:",
      choices: FRAMERATES,
      default: CHANNEL_DEFAULTS.framerate,
    },
    {
      type: "number",
      name: "videoBitrateKbps",
      message: "Video bitrate (kbps):",
      default: CHANNEL_DEFAULTS.videoBitrateKbps,
      validate: (input: number) => (Number.isInteger(input) && input > 0 ? true : "Bitrate must be a positive whole number"),
    },
    {
      type: "number",
      name: "audioBitrateKbps",
      message: "Audio bitrate (kbps):",
      default: CHANNEL_DEFAULTS.audioBitrateKbps,
      validate: (input: number) => (Number.isInteger(input) && input > 0 ? true : "Bitrate must be a positive whole number"),
    },
    {
      type: "confirm",
      name: "autoStart",
      message: "Start this channel automatically?",
      default: CHANNEL_DEFAULTS.autoStart,
    },
  ]);

  const trimmedVideo = videoDeviceId.trim();

  return {
    channelName,
    videoDeviceId: trimmedVideo,
    videoDeviceLabel: labelFor(devices.videoDevices, trimmedVideo),
    audioDeviceId: audioDeviceId === NO_DEVICE ? undefined : audioDeviceId,
    audioDeviceLabel: audioDeviceId === NO_DEVICE ? "" : labelFor(devices.audioDevices, audioDeviceId),
    ...answers,
  };
};
