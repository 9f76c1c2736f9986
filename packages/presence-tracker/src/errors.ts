export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export class DeliveryError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "DeliveryError";
    this.status = status;
  }
}

/** The destination exists but refuses our messages. */
export class DeliveryPermissionError extends DeliveryError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "DeliveryPermissionError";
  }
}

export class ChannelMissingError extends DeliveryError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "ChannelMissingError";
  }
}

/** The destination no longer holds the entitlement that live features need. */
export class EntitlementLostError extends DeliveryError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "EntitlementLostError";
  }
}
