export class SecretProvisioningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SecretProvisioningError";
  }
}

export class GatewayRegistrationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayRegistrationError";
  }
}

export class ShutdownTimeoutError extends Error {
  constructor(readonly target: string, readonly timeoutMs: number) {
    super(`${target} did not stop within ${timeoutMs}ms`);
    this.name = "ShutdownTimeoutError";
  }
}

export class LifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LifecycleError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
