export class UnexpectedSchemaError extends Error {
  readonly url: string;
  readonly path: string;

  constructor(url: string, path: string, detail?: string) {
    super(
      `Unexpected schema from ${url}: ${path}${detail ? ` (${detail})` : ""}`
    );
    this.name = "UnexpectedSchemaError";
    this.url = url;
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
