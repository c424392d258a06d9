import { spawn } from "child_process";
import { createInterface } from "readline";
import { PassThrough, type Readable, type Writable } from "stream";

/**
 * The slice of ChildProcess the supervisor relies on. Kept narrow so tests can drive
 * lifecycles with an in-process stand-in.
 */
export interface SpawnedProcess {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): this;
  once(event: "spawn", listener: () => void): this;
  once(event: "error", listener: (error: Error) => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export interface SpawnRequest {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  keepStdinOpen?: boolean;
}

export type ProcessSpawner = (command: string, args: string[], options?: SpawnRequest) => SpawnedProcess;

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export const spawnProcess: ProcessSpawner = (command, args, options = {}) =>
  spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: [options.keepStdinOpen ? "pipe" : "ignore", "pipe", "pipe"],
    windowsHide: true,
  });

/** Settles once the process is running, or with the error when it could not be started. */
export const waitForSpawn = (child: SpawnedProcess): Promise<{ spawned: true } | { spawned: false; error: Error }> =>
  new Promise((resolve) => {
    let settled = false;
    child.once("spawn", () => {
      if (!settled) {
        settled = true;
        resolve({ spawned: true });
      }
    });
    child.once("error", (error) => {
      if (!settled) {
        settled = true;
        resolve({ spawned: false, error });
      }
    });
  });

/**
 * Interleave stdout and stderr into one stream and report every trimmed, non-empty line.
 * The returned promise settles when both sources have closed; destroying them is enough to
 * end the reader.
 */
export const readMergedLines = (child: SpawnedProcess, onLine: (line: string) => void): Promise<void> => {
  const merged = new PassThrough();
  const sources = [child.stdout, child.stderr].filter((source): source is Readable => source !== null);
  let open = sources.length;

  const sourceClosed = (): void => {
    open -= 1;
    if (open === 0) {
      merged.end();
    }
  };

  for (const source of sources) {
    source.once("close", sourceClosed);
    source.on("error", () => source.destroy());
    source.pipe(merged, { end: false });
  }

  if (open === 0) {
    merged.end();
  }

  // readline also splits on bare "\r", which ffmpeg uses for its progress line
  const reader = createInterface({ input: merged, crlfDelay: Infinity });
  reader.on("line", (line) => {
    const trimmed = line.trim();
    if (trimmed) {
      onLine(trimmed);
    }
  });

  return new Promise((resolve) => reader.once("close", () => resolve()));
};

export const closeStreams = (child: SpawnedProcess): void => {
  for (const stream of [child.stdin, child.stdout, child.stderr]) {
    if (stream && !stream.destroyed) {
      stream.destroy();
    }
  }
};

/** Resolve with the promise's value, or `undefined` once `timeoutMs` has elapsed. */
export const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number): Promise<T | undefined> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};
