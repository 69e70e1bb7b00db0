export class ConfigMissingTokenError extends Error {
  constructor() {
    super(
      "Missing GitHub token. Pass --github-token, set GITHUB_TOKEN (or GH_TOKEN), or log in with `gh auth login`."
    );
    this.name = "ConfigMissingTokenError";
  }
}

export class ConfigInvalidValueError extends Error {
  constructor(key: string, value: unknown, expected: string) {
    super(`Invalid value for ${key}: ${JSON.stringify(value)} (expected ${expected}).`);
    this.name = "ConfigInvalidValueError";
  }
}

export class ConfigFileParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Config file ${filePath} is not valid JSON: ${message}`);
    this.name = "ConfigFileParseError";
  }
}

export class InvalidRepositoryRefError extends Error {
  constructor(value: string) {
    super(`Invalid repository "${value}". Use owner/name or a bare name owned by you.`);
    this.name = "InvalidRepositoryRefError";
  }
}

export class MissingRepositorySelectionError extends Error {
  constructor() {
    super("No repositories given. Pass owner/name arguments or --active.");
    this.name = "MissingRepositorySelectionError";
  }
}
