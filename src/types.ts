export interface Device {
  name: string;
  altId: string; // DirectShow "Alternative name", stable across reboots and USB re-plugs
}

export interface DeviceList {
  videoDevices: Device[];
  audioDevices: Device[];
  rawDiagnosticText: string;
}

export interface ChannelConfig {
  channelName: string;
  videoDeviceId?: string;
  audioDeviceId?: string;
  videoDeviceLabel: string;
  audioDeviceLabel: string;
  frameSize: string; // "WxH", or "" to keep the capture size
  framerate: number;
  videoBitrateKbps: number;
  audioBitrateKbps: number;
  autoStart: boolean;
}

export interface MediaServerConfig {
  directory: string;
  executable: string; // relative to directory unless absolute
}

export interface AppConfig {
  encoderPath: string;
  mediaServer: MediaServerConfig;
  outputRoot: string;
  channels: ChannelConfig[];
}

export type ChannelStatus =
  | { state: "idle" }
  | { state: "starting" }
  | { state: "running" }
  | { state: "stopping" }
  | { state: "failed"; exitCode: number };

export type LogLevel = "info" | "warn" | "error" | "verbose";

export interface ChannelState {
  config: ChannelConfig;
  slug: string;
  outputDir: string;
  status: ChannelStatus;
  logTail: string[];
  lastExitCode?: number;
}

export type SupervisorEvent =
  | { type: "log"; source: string; level: LogLevel; message: string; timestamp: Date }
  | { type: "status"; source: string; status: ChannelStatus; timestamp: Date }
  | { type: "exit"; source: string; exitCode: number; requested: boolean; timestamp: Date };

export interface CommandSpec {
  command: string;
  args: string[];
  playlistPath: string;
  segmentPattern: string;
}

export interface RuntimeOptions {
  verbose: boolean;
  config?: string;
}
