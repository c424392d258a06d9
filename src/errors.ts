export type SupervisorErrorCode =
  | "MISSING_EXECUTABLE"
  | "DEVICE_IN_USE"
  | "DUPLICATE_CHANNEL"
  | "CHANNEL_BUSY"
  | "DEPENDENT_SERVICE_UNAVAILABLE"
  | "PROCESS_LAUNCH_FAILURE"
  | "IO_FAILURE"
  | "INVALID_CHANNEL_CONFIG"
  | "UNKNOWN_CHANNEL";

export class SupervisorError extends Error {
  public readonly code: SupervisorErrorCode;

  constructor(code: SupervisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingExecutableError extends SupervisorError {
  public readonly executablePath: string;

  constructor(executablePath: string, options?: { cause?: unknown }) {
    super("MISSING_EXECUTABLE", `Executable not found at: ${executablePath}`, options);
    this.executablePath = executablePath;
  }
}

export class DeviceInUseError extends SupervisorError {
  public readonly owner: string;
  public readonly altId: string;

  constructor(altId: string, owner: string) {
    super("DEVICE_IN_USE", `This video device is already used in channel '${owner}'. Select a different capture device.`);
    this.altId = altId;
    this.owner = owner;
  }
}

export class DuplicateChannelError extends SupervisorError {
  constructor(channelName: string, existing: string) {
    super(
      "DUPLICATE_CHANNEL",
      existing === channelName
        ? `Channel '${channelName}' already exists`
        : `Channel '${channelName}' collides with existing channel '${existing}' (same output folder)`,
    );
  }
}

export class ChannelBusyError extends SupervisorError {
  constructor(channelName: string, state: string) {
    super("CHANNEL_BUSY", `Channel '${channelName}' is ${state}; stop it first`);
  }
}

export class DependentServiceUnavailableError extends SupervisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DEPENDENT_SERVICE_UNAVAILABLE", message, options);
  }
}

export class ProcessLaunchError extends SupervisorError {
  constructor(description: string, cause: unknown) {
    super("PROCESS_LAUNCH_FAILURE", `Failed to launch ${description}: ${describeError(cause)}`, { cause });
  }
}

export class IoFailureError extends SupervisorError {
  constructor(message: string, cause?: unknown) {
    super("IO_FAILURE", cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
  }
}

export class InvalidChannelConfigError extends SupervisorError {
  constructor(message: string) {
    super("INVALID_CHANNEL_CONFIG", message);
  }
}

export class UnknownChannelError extends SupervisorError {
  constructor(channelName: string) {
    super("UNKNOWN_CHANNEL", `No channel named '${channelName}'`);
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
