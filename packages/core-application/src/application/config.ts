import os from "node:os";
import path from "node:path";
import { z } from "zod";

import type { LogLevel } from "../ports/logger";
import { ConfigInvalidError } from "./errors";

export type ConfigLogLevel = LogLevel | "silent";

export type DirsnapConfig = {
  /** Directory holding archives, the tag index and lock files. */
  repositoryRoot: string;
  tagIndexPath: string;
  locksDir: string;
  logLevel: ConfigLogLevel;
  /** Skip the confirm-before-copy decision. */
  assumeYes: boolean;
  watchDebounceMs: number;
};

export interface ResolveConfigOptions {
  env?: Record<string, string | undefined>;
  homedir?: string;
  cwd?: string;
}

const DEFAULT_REPOSITORY_DIRNAME = ".dirsnap";
const DEFAULT_WATCH_DEBOUNCE_MS = 500;

const booleanLikeSchema = z.string().trim().transform((raw, ctx) => {
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "n", "off", ""].includes(normalized)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid_boolean" });
  return z.NEVER;
});

const nonNegativeIntegerLikeSchema = z
  .string()
  .trim()
  .min(1)
  .transform((raw, ctx) => {
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid_non_negative_integer" });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  DIRSNAP_HOME: z.string().trim().min(1).optional(),
  DIRSNAP_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  DIRSNAP_ASSUME_YES: booleanLikeSchema.optional(),
  DIRSNAP_WATCH_DEBOUNCE_MS: nonNegativeIntegerLikeSchema.optional(),
});

/**
 * Resolves process-wide settings once at startup. Everything downstream takes
 * the result explicitly so tests can point the repository at a temp dir.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): DirsnapConfig {
  const env = options.env ?? process.env;
  const homedir = options.homedir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();

  const parsed = envSchema.safeParse({
    DIRSNAP_HOME: env.DIRSNAP_HOME,
    DIRSNAP_LOG_LEVEL: env.DIRSNAP_LOG_LEVEL,
    DIRSNAP_ASSUME_YES: env.DIRSNAP_ASSUME_YES,
    DIRSNAP_WATCH_DEBOUNCE_MS: env.DIRSNAP_WATCH_DEBOUNCE_MS,
  });
  if (!parsed.success) {
    throw new ConfigInvalidError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const repositoryRoot = values.DIRSNAP_HOME
    ? path.resolve(cwd, expandHome(values.DIRSNAP_HOME, homedir))
    : path.join(homedir, DEFAULT_REPOSITORY_DIRNAME);

  return {
    repositoryRoot,
    tagIndexPath: path.join(repositoryRoot, "tags.json"),
    locksDir: path.join(repositoryRoot, "locks"),
    logLevel: values.DIRSNAP_LOG_LEVEL ?? "info",
    assumeYes: values.DIRSNAP_ASSUME_YES ?? false,
    watchDebounceMs: values.DIRSNAP_WATCH_DEBOUNCE_MS ?? DEFAULT_WATCH_DEBOUNCE_MS,
  };
}

function expandHome(p: string, homedir: string): string {
  if (p === "~") return homedir;
  if (p.startsWith("~/")) return path.join(homedir, p.slice(2));
  return p;
}
