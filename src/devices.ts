import fs from "fs-extra";
import type { Device, DeviceList } from "./types.js";
import { type CommandRunner, ExecError, execFileSafe } from "./utils/exec.js";
import { describeError } from "./errors.js";
import { looksLikePath } from "./utils/paths.js";

export const DEVICE_LIST_TIMEOUT_MS = 10_000;

type Section = "video" | "audio";

/**
 * Parse the device listing ffmpeg prints for `-list_devices true -f dshow`.
 *
 * Older builds group devices under "DirectShow video devices" / "DirectShow audio devices"
 * headers; newer builds print no headers and tag each line with "(video)" or "(audio)".
 * Both layouts are accepted, and lines that match neither shape are ignored.
 */
export const parseDeviceList = (text: string): Pick<DeviceList, "videoDevices" | "audioDevices"> => {
  const videoDevices: Device[] = [];
  const audioDevices: Device[] = [];
  let section: Section | undefined;
  let lastOpened: Device | undefined;

  for (const line of text.split(/\r?\n/)) {
    if (line.includes("DirectShow video devices")) {
      section = "video";
      lastOpened = undefined;
      continue;
    }
    if (line.includes("DirectShow audio devices")) {
      section = "audio";
      lastOpened = undefined;
      continue;
    }

    const quoted = line.split('"')[1];
    if (!quoted) {
      continue;
    }

    if (line.includes("Alternative name")) {
      if (lastOpened) {
        lastOpened.altId = quoted;
      }
      continue;
    }

    let target: Section | undefined = section;
    if (line.includes("(video)")) {
      target = "video";
    } else if (line.includes("(audio)")) {
      target = "audio";
    }

    if (!target) {
      continue;
    }

    const device: Device = { name: quoted, altId: quoted };
    (target === "video" ? videoDevices : audioDevices).push(device);
    lastOpened = device;
  }

  return { videoDevices, audioDevices };
};

const diagnosticFor = (backendPath: string, error: unknown): string => {
  if (error instanceof ExecError) {
    if (error.notFound) {
      return `${backendPath} not found. Cannot list devices.`;
    }
    if (error.timedOut) {
      return `Listing devices with ${backendPath} timed out.`;
    }
    return `An error occurred while listing devices: ${error.message}`;
  }
  return `An error occurred while listing devices: ${describeError(error)}`;
};

/**
 * Ask the capture backend for its DirectShow devices. Never throws: on any failure the
 * device lists are empty and `rawDiagnosticText` says why.
 */
export const listDevices = async (
  backendPath: string,
  run: CommandRunner = execFileSafe,
  timeoutMs: number = DEVICE_LIST_TIMEOUT_MS,
): Promise<DeviceList> => {
  const empty = (rawDiagnosticText: string): DeviceList => ({ videoDevices: [], audioDevices: [], rawDiagnosticText });

  if (looksLikePath(backendPath) && !(await fs.pathExists(backendPath))) {
    return empty(`${backendPath} not found. Cannot list devices.`);
  }

  let output: string;
  try {
    const result = await run(backendPath, ["-hide_banner", "-list_devices", "true", "-f", "dshow", "-i", "dummy"], {
      timeoutMs,
    });
    output = result.stderr;
  } catch (error) {
    // The listing always ends with "dummy: Immediate exit requested" and a non-zero
    // status, so a failed run that still printed devices is the normal case.
    if (error instanceof ExecError && !error.notFound && !error.timedOut && error.stderr) {
      output = error.stderr;
    } else {
      return empty(diagnosticFor(backendPath, error));
    }
  }

  const parsed = parseDeviceList(output);
  return { ...parsed, rawDiagnosticText: output || `${backendPath} printed no device listing.` };
};
