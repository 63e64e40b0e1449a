/** A listing page answered with a non-success HTTP status */
export class FetchError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "FetchError";
  }
}

/** A serialized price could not be read as a decimal number */
export class PriceParseError extends Error {
  constructor(
    readonly product: string,
    readonly token: string
  ) {
    super(`Invalid price "${token}" for product "${product}"`);
    this.name = "PriceParseError";
  }
}

/** The ledger or aggregate CSV is missing or does not have the expected layout */
export class LedgerError extends Error {
  constructor(
    readonly filePath: string,
    message: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = "LedgerError";
  }
}

/** Environment, targets or extraction rules failed validation */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
