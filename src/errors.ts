export type HushTypeErrorCode =
  | 'fatal_startup'
  | 'device'
  | 'connect'
  | 'send'
  | 'injection';

export class HushTypeError extends Error {
  public constructor(
    public readonly code: HushTypeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input layer, configuration or a required tool is unavailable. Ends the process. */
export class FatalStartupError extends HushTypeError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('fatal_startup', message, options);
  }
}

export class DeviceError extends HushTypeError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('device', message, options);
  }
}

export class ConnectError extends HushTypeError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('connect', message, options);
  }
}

export class SendError extends HushTypeError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('send', message, options);
  }
}

export class InjectionError extends HushTypeError {
  public constructor(
    public readonly character: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('injection', message, options);
  }
}

export const errorDetail = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const describeError = (error: unknown): { code?: string; detail: string } => {
  if (error instanceof HushTypeError) {
    return { code: error.code, detail: error.message };
  }

  return { detail: errorDetail(error) };
};
