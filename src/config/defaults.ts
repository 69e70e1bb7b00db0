export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_API_VERSION = "2022-11-28";
export const DEFAULT_USER_AGENT = "repo-audit";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 32;
export const DEFAULT_PAGE_SIZE = 100;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RATE_LIMIT_WAIT_MS = 15 * 60_000;

export const DEFAULT_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000
} as const;

export const CONFIG_FILE_NAMES = ["repo-audit.config.json", ".repoauditrc.json"];

export const TOKEN_ENV_VARS = ["GITHUB_TOKEN", "GH_TOKEN"];
