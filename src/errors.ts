export class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

export class CheckpointCorruptError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'CheckpointCorruptError';
  }
}

export class CheckpointWriteError extends Error {
  constructor(
    readonly file: string,
    readonly reason: unknown
  ) {
    super(`Failed to write checkpoint ${file}: ${errorMessage(reason)}`);
    this.name = 'CheckpointWriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
