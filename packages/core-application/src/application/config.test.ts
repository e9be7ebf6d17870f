import path from "node:path";
import { describe, expect, it } from "vitest";

import { resolveConfig } from "./config";
import { ConfigInvalidError } from "./errors";

describe("resolveConfig", () => {
  it("defaults to ~/.dirsnap", () => {
    const config = resolveConfig({ env: {}, homedir: "/home/tester", cwd: "/work" });

    expect(config).toEqual({
      repositoryRoot: path.join("/home/tester", ".dirsnap"),
      tagIndexPath: path.join("/home/tester", ".dirsnap", "tags.json"),
      locksDir: path.join("/home/tester", ".dirsnap", "locks"),
      logLevel: "info",
      assumeYes: false,
      watchDebounceMs: 500,
    });
  });

  it("reads overrides from the environment", () => {
    const config = resolveConfig({
      env: {
        DIRSNAP_HOME: "~/snaps",
        DIRSNAP_LOG_LEVEL: "debug",
        DIRSNAP_ASSUME_YES: "Yes",
        DIRSNAP_WATCH_DEBOUNCE_MS: "1500",
      },
      homedir: "/home/tester",
      cwd: "/work",
    });

    expect(config.repositoryRoot).toBe(path.join("/home/tester", "snaps"));
    expect(config.logLevel).toBe("debug");
    expect(config.assumeYes).toBe(true);
    expect(config.watchDebounceMs).toBe(1500);
  });

  it("resolves a relative repository against cwd", () => {
    const config = resolveConfig({ env: { DIRSNAP_HOME: "repo" }, homedir: "/h", cwd: "/work" });
    expect(config.repositoryRoot).toBe(path.resolve("/work", "repo"));
  });

  it("rejects invalid values with every issue listed", () => {
    let caught: unknown;
    try {
      resolveConfig({
        env: { DIRSNAP_LOG_LEVEL: "loud", DIRSNAP_WATCH_DEBOUNCE_MS: "-1" },
        homedir: "/h",
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigInvalidError);
    const issues = caught instanceof ConfigInvalidError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^DIRSNAP_LOG_LEVEL: /);
    expect(issues[1]).toBe("DIRSNAP_WATCH_DEBOUNCE_MS: invalid_non_negative_integer");
  });
});
