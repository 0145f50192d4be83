import * as core from "@actions/core";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { toError, type Result } from "./lib.js";

const execFileAsync = promisify(execFile);

export type Config = {
  readonly token: string;
  readonly tokenSource: "input" | "GH_TOKEN" | "GITHUB_TOKEN" | "gh";
};

export type Env = Readonly<Record<string, string | undefined>>;

export type CliTokenReader = () => Promise<string | undefined>;

/** Asks the GitHub CLI for the token of its logged-in account. */
export const readGhCliToken: CliTokenReader = async () => {
  try {
    const { stdout } = await execFileAsync("gh", ["auth", "token"]);
    return stdout.trim() || undefined;
  } catch (error) {
    core.debug(`gh auth token failed: ${toError(error).message}`);
    return undefined;
  }
};

export const parseConfig = async (
  env: Env = process.env,
  readCliToken: CliTokenReader = readGhCliToken
): Promise<Result<Config>> => {
  const input = core.getInput("token");
  if (input) {
    return { ok: true, value: { token: input, tokenSource: "input" } };
  }

  const ghToken = env["GH_TOKEN"];
  if (ghToken) {
    return { ok: true, value: { token: ghToken, tokenSource: "GH_TOKEN" } };
  }

  const githubToken = env["GITHUB_TOKEN"];
  if (githubToken) {
    return {
      ok: true,
      value: { token: githubToken, tokenSource: "GITHUB_TOKEN" },
    };
  }

  const cliToken = await readCliToken();
  if (cliToken) {
    return { ok: true, value: { token: cliToken, tokenSource: "gh" } };
  }

  return {
    ok: false,
    error: new Error(
      "Not authenticated with GitHub. Run 'gh auth login' or set GH_TOKEN / GITHUB_TOKEN."
    ),
  };
};
