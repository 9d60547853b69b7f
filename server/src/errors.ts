/** Invalid launcher configuration; the process refuses to start */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Bind mount could not be established */
export class MountError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MountError';
  }
}

/** Unrecoverable backend lifecycle failure (spawn failed, child could not be signaled) */
export class SupervisorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupervisorError';
  }
}

/** Request-scoped CGI failure, rendered as a plaintext response with `status` */
export class GatewayError extends Error {
  readonly status: number;

  constructor(message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
