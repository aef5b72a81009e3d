import { BotwireError } from "./botwire-error";

type ConfigurationErrorCode = "invalid_config";

/** Thrown by `new Bot()` for a configuration that fails validation. */
export class ConfigurationError extends BotwireError {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}
