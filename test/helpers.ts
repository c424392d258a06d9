import { EventEmitter } from "events";
import os from "os";
import path from "path";
import { PassThrough } from "stream";
import fs from "fs-extra";
import { vi } from "vitest";
import { Logger } from "../src/utils/logger.js";
import type { ProcessSpawner, SpawnRequest } from "../src/pipes.js";
import type { CommandRunner, ExecOptions } from "../src/utils/exec.js";
import { DependentServiceUnavailableError } from "../src/errors.js";
import type { DependentService } from "../src/mediaServer.js";
import type { ChannelConfig } from "../src/types.js";

export interface FakeBehaviour {
  // Exit with code 0 when "q" arrives on stdin
  quitOnQ?: boolean;
  // Emit an ENOENT error instead of "spawn"
  missing?: boolean;
}

/** In-process stand-in for a ChildProcess. */
export class FakeProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly input: string[] = [];
  readonly killSignals: Array<NodeJS.Signals | undefined> = [];
  pid: number | undefined;
  exited = false;

  constructor(behaviour: FakeBehaviour = {}) {
    super();
    this.stdin.setEncoding("utf-8");
    this.stdin.on("data", (chunk: string) => {
      this.input.push(chunk);
      if (behaviour.quitOnQ && chunk.startsWith("q")) {
        this.exit(0);
      }
    });

    process.nextTick(() => {
      if (behaviour.missing) {
        this.emit("error", Object.assign(new Error("spawn ffmpeg ENOENT"), { code: "ENOENT" }));
        return;
      }
      this.pid = 4242;
      this.emit("spawn");
    });
  }

  print(line: string, stream: "stdout" | "stderr" = "stderr"): void {
    this[stream].write(`${line}\n`);
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.killSignals.push(signal);
    this.exit(null, signal ?? "SIGTERM");
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.stdout.end();
    this.stderr.end();
    setTimeout(() => {
      this.emit("exit", code, signal);
      this.emit("close", code, signal);
    }, 5);
  }
}

export interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnRequest | undefined;
  process: FakeProcess;
}

export const fakeSpawner = (behaviour: FakeBehaviour = { quitOnQ: true }) => {
  const calls: SpawnCall[] = [];
  const spawner: ProcessSpawner = (command, args, options) => {
    const child = new FakeProcess(behaviour);
    calls.push({ command, args, options, process: child });
    return child;
  };
  return { spawner, calls };
};

export interface RunCall {
  file: string;
  args: string[];
  options: ExecOptions | undefined;
}

export const fakeRunner = (handler: (call: RunCall) => Promise<void> | void = () => {}) => {
  const calls: RunCall[] = [];
  const run: CommandRunner = async (file, args, options) => {
    const call = { file, args, options };
    calls.push(call);
    await handler(call);
    return { stdout: "", stderr: "" };
  };
  return { run, calls };
};

/** Reference counter standing in for the media server. */
export class FakeService implements DependentService {
  launches = 0;
  stops = 0;
  acquires = 0;
  releases = 0;
  available = true;
  private count = 0;

  get isRunning(): boolean {
    return this.count > 0;
  }

  get activeChannelCount(): number {
    return this.count;
  }

  async acquire(): Promise<void> {
    if (!this.available) {
      throw new DependentServiceUnavailableError("Media server not found at: /opt/nginx/nginx");
    }
    this.acquires += 1;
    if (this.count === 0) {
      this.launches += 1;
    }
    this.count += 1;
  }

  async release(): Promise<void> {
    if (this.count === 0) {
      return;
    }
    this.releases += 1;
    this.count -= 1;
    if (this.count === 0) {
      this.stops += 1;
    }
  }

  async shutdown(): Promise<void> {
    if (this.count > 0) {
      this.stops += 1;
    }
    this.count = 0;
  }
}

export const channelConfig = (channelName: string, overrides: Partial<ChannelConfig> = {}): ChannelConfig => ({
  channelName,
  videoDeviceId: `@video-${channelName}`,
  audioDeviceId: undefined,
  videoDeviceLabel: "",
  audioDeviceLabel: "",
  frameSize: "1280x720",
  framerate: 30,
  videoBitrateKbps: 1200,
  audioBitrateKbps: 96,
  autoStart: false,
  ...overrides,
});

export const quietLogger = (): Logger => {
  const logger = new Logger(false);
  vi.spyOn(logger, "info").mockImplementation(() => {});
  vi.spyOn(logger, "success").mockImplementation(() => {});
  vi.spyOn(logger, "warn").mockImplementation(() => {});
  vi.spyOn(logger, "error").mockImplementation(() => {});
  vi.spyOn(logger, "verboseLog").mockImplementation(() => {});
  return logger;
};

export const makeTempDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), "channel-manager-"));

export const waitFor = async (condition: () => boolean, timeoutMs = 2_000): Promise<void> => {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error("Timed out waiting for condition");
    }
    // eslint-disable-next-line no-await-in-loop
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
};
