export type CadenceErrorCode =
  | "CONFIG_LOAD"
  | "INVALID_FORMAT"
  | "INVALID_SPEC"
  | "UNKNOWN_BLOCK"
  | "ALERT_DELIVERY";

export class CadenceError extends Error {
  constructor(
    message: string,
    public readonly code: CadenceErrorCode,
  ) {
    super(message);
    this.name = "CadenceError";
  }
}

/** A config or schedule file is missing, unparsable, or not a JSON object. */
export class ConfigLoadError extends CadenceError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(`Cannot load ${filePath}: ${reason}`, "CONFIG_LOAD");
    this.name = "ConfigLoadError";
  }
}

export class InvalidFormatError extends CadenceError {
  constructor(public readonly value: string, expected = "HH:MM") {
    super(`Invalid time '${value}', expected ${expected}`, "INVALID_FORMAT");
    this.name = "InvalidFormatError";
  }
}

export class InvalidSpecError extends CadenceError {
  constructor(
    public readonly spec: string,
    reason: string,
  ) {
    super(`Invalid recurrence '${spec}': ${reason}`, "INVALID_SPEC");
    this.name = "InvalidSpecError";
  }
}

export class UnknownBlockReferenceError extends CadenceError {
  constructor(
    public readonly blockName: string,
    public readonly time: string,
  ) {
    super(`Unknown block type '${blockName}' at ${time}`, "UNKNOWN_BLOCK");
    this.name = "UnknownBlockReferenceError";
  }
}

export class AlertDeliveryError extends CadenceError {
  constructor(reason: string) {
    super(`Alert could not be delivered: ${reason}`, "ALERT_DELIVERY");
    this.name = "AlertDeliveryError";
  }
}
