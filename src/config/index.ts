import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { ConfigurationError, errorMessage } from "../errors";
import { appConfigSchema, credentialsSchema } from "./schema";
import type { AppConfig, FeedCredentials, TargetConfig } from "./schema";

function formatIssues(issues: ReadonlyArray<ZodIssue>): string {
  return issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `failed to read config file at ${configPath}: ${errorMessage(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `failed to parse YAML in ${configPath}: ${errorMessage(err)}`,
    );
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `invalid configuration in ${configPath}:\n${formatIssues(result.error.issues)}`,
    );
  }

  return result.data;
}

/**
 * Reads the feed client's user-context credentials from the environment.
 * Every key is required; the error lists all that are missing at once.
 */
export function loadCredentials(
  env: Readonly<Record<string, string | undefined>>,
): FeedCredentials {
  const result = credentialsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      `missing feed credentials:\n${formatIssues(result.error.issues)}`,
    );
  }

  return {
    consumerKey: result.data.TWITTER_CONSUMER_KEY,
    consumerSecret: result.data.TWITTER_CONSUMER_SECRET,
    accessToken: result.data.TWITTER_ACCESS_TOKEN,
    accessTokenSecret: result.data.TWITTER_ACCESS_TOKEN_SECRET,
  };
}

export type { AppConfig, FeedCredentials, TargetConfig };
