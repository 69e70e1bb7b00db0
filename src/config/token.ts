import { execFile } from "node:child_process";
import { readFirstEnv } from "./env.js";
import { TOKEN_ENV_VARS } from "./defaults.js";
import { ConfigMissingTokenError } from "../errors/config.errors.js";

export type TokenSource = "flag" | "env" | "gh-cli";

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export type GhTokenReader = () => Promise<string | null>;

/** Asks the GitHub CLI for its stored token; null when `gh` is missing or logged out. */
export const readGhCliToken: GhTokenReader = () =>
  new Promise((resolve) => {
    execFile("gh", ["auth", "token"], { encoding: "utf-8", timeout: 10_000 }, (error, stdout) => {
      if (error) {
        resolve(null);
        return;
      }
      const token = stdout.trim();
      resolve(token || null);
    });
  });

export async function resolveToken(
  flagValue: string | null | undefined,
  readGhToken: GhTokenReader = readGhCliToken
): Promise<ResolvedToken> {
  const fromFlag = flagValue?.trim();
  if (fromFlag) return { token: fromFlag, source: "flag" };

  const fromEnv = readFirstEnv(TOKEN_ENV_VARS);
  if (fromEnv) return { token: fromEnv, source: "env" };

  const fromCli = await readGhToken();
  if (fromCli) return { token: fromCli, source: "gh-cli" };

  throw new ConfigMissingTokenError();
}
