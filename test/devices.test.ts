import path from "path";
import { describe, expect, it } from "vitest";
import { listDevices, parseDeviceList } from "../src/devices.js";
import { ExecError, type CommandRunner } from "../src/utils/exec.js";
import { makeTempDir } from "./helpers.js";

const sectionedListing = [
  "[dshow @ 0000020a] DirectShow video devices (some may be both video and audio devices)",
  '[dshow @ 0000020a]  "Desk Camera"',
  '[dshow @ 0000020a]     Alternative name "@device_pnp_desk-camera"',
  '[dshow @ 0000020a]  "Capture Card"',
  '[dshow @ 0000020a]     Alternative name "@device_pnp_capture-card"',
  "[dshow @ 0000020a] DirectShow audio devices",
  '[dshow @ 0000020a]  "Line In (Test Audio)"',
  '[dshow @ 0000020a]     Alternative name "@device_cm_line-in"',
  "dummy: Immediate exit requested",
].join("\r\n");

const taggedListing = [
  '[dshow @ 000001] "Desk Camera" (video)',
  '[dshow @ 000001]   Alternative name "@device_pnp_desk-camera"',
  '[dshow @ 000001] "Headset Mic" (audio)',
  '[dshow @ 000001]   Alternative name "@device_cm_headset"',
  '[dshow @ 000001] "Virtual Cam" (video)',
].join("\n");

describe("parseDeviceList", () => {
  it("reads devices from header-delimited sections", () => {
    const { videoDevices, audioDevices } = parseDeviceList(sectionedListing);

    expect(videoDevices).toEqual([
      { name: "Desk Camera", altId: "@device_pnp_desk-camera" },
      { name: "Capture Card", altId: "@device_pnp_capture-card" },
    ]);
    expect(audioDevices).toEqual([{ name: "Line In (Test Audio)", altId: "@device_cm_line-in" }]);
  });

  it("reads devices tagged with their type and defaults altId to the name", () => {
    const { videoDevices, audioDevices } = parseDeviceList(taggedListing);

    expect(videoDevices).toEqual([
      { name: "Desk Camera", altId: "@device_pnp_desk-camera" },
      { name: "Virtual Cam", altId: "Virtual Cam" },
    ]);
    expect(audioDevices).toEqual([{ name: "Headset Mic", altId: "@device_cm_headset" }]);
  });

  it("skips malformed and unquoted lines", () => {
    const text = [
      "ffmpeg version n6.1 Copyright (c) 2000-2023",
      '[dshow @ 1] Alternative name "@orphan"',
      "[dshow @ 1] DirectShow video devices",
      '[dshow @ 1] "unterminated',
      '[dshow @ 1] ""',
      "garbage line",
      '[dshow @ 1]  "Real Camera"',
    ].join("\n");

    const { videoDevices, audioDevices } = parseDeviceList(text);

    expect(videoDevices).toEqual([
      { name: "unterminated", altId: "unterminated" },
      { name: "Real Camera", altId: "Real Camera" },
    ]);
    expect(audioDevices).toEqual([]);
  });

  it("does not attach an alternative name across a section header", () => {
    const text = [
      "DirectShow video devices",
      ' "Cam"',
      "DirectShow audio devices",
      ' Alternative name "@belongs-to-nobody"',
    ].join("\n");

    expect(parseDeviceList(text).videoDevices).toEqual([{ name: "Cam", altId: "Cam" }]);
  });
});

describe("listDevices", () => {
  it("returns empty lists and a diagnostic when the executable does not exist", async () => {
    const dir = await makeTempDir();
    const missing = path.join(dir, "ffmpeg.exe");

    const result = await listDevices(missing);

    expect(result.videoDevices).toEqual([]);
    expect(result.audioDevices).toEqual([]);
    expect(result.rawDiagnosticText).toBe(`${missing} not found. Cannot list devices.`);
  });

  it("parses the listing from a run that exits non-zero", async () => {
    const run: CommandRunner = async (file, args) => {
      throw new ExecError([file, ...args].join(" "), 1, "", sectionedListing);
    };

    const result = await listDevices("ffmpeg", run);

    expect(result.videoDevices.map((device) => device.name)).toEqual(["Desk Camera", "Capture Card"]);
    expect(result.audioDevices.map((device) => device.altId)).toEqual(["@device_cm_line-in"]);
    expect(result.rawDiagnosticText).toBe(sectionedListing);
  });

  it("passes the enumeration arguments and timeout to the runner", async () => {
    const seen: Array<{ file: string; args: string[]; timeoutMs?: number }> = [];
    const run: CommandRunner = async (file, args, options) => {
      seen.push({ file, args, timeoutMs: options?.timeoutMs });
      return { stdout: "", stderr: taggedListing };
    };

    await listDevices("ffmpeg", run, 1234);

    expect(seen).toEqual([
      {
        file: "ffmpeg",
        args: ["-hide_banner", "-list_devices", "true", "-f", "dshow", "-i", "dummy"],
        timeoutMs: 1234,
      },
    ]);
  });

  it("treats a timeout as a soft failure", async () => {
    const run: CommandRunner = async () => {
      throw new ExecError("ffmpeg -list_devices true", null, "", "partial", true);
    };

    const result = await listDevices("ffmpeg", run);

    expect(result.videoDevices).toEqual([]);
    expect(result.rawDiagnosticText).toBe("Listing devices with ffmpeg timed out.");
  });

  it("reports an executable missing from PATH", async () => {
    const run: CommandRunner = async () => {
      throw new ExecError("ffmpeg", "ENOENT", "", "");
    };

    const result = await listDevices("ffmpeg", run);

    expect(result.audioDevices).toEqual([]);
    expect(result.rawDiagnosticText).toBe("ffmpeg not found. Cannot list devices.");
  });
});
