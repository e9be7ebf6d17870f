import { describe, expect, it } from "vitest";

import { ConsoleLogger } from "./console-logger";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, sink: { out: (l: string) => out.push(l), err: (l: string) => err.push(l) } };
}

describe("ConsoleLogger", () => {
  it("filters below the configured level", () => {
    const c = capture();
    const logger = new ConsoleLogger("warn", undefined, c.sink);

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(c.out).toEqual([]);
    expect(c.err).toEqual(["w", "e"]);
  });

  it("prefixes nested scopes", () => {
    const c = capture();
    const logger = new ConsoleLogger("debug", "dirsnap", c.sink).child("sync");

    logger.debug("pass done");

    expect(c.out).toEqual(["[dirsnap:sync] pass done"]);
  });

  it("appends the error message", () => {
    const c = capture();
    new ConsoleLogger("info", undefined, c.sink).error("Copy failed", new Error("disk full"));

    expect(c.err).toEqual(["Copy failed: disk full"]);
  });

  it("stays quiet when silent", () => {
    const c = capture();
    const logger = new ConsoleLogger("silent", undefined, c.sink);
    logger.error("nope");
    expect(c.err).toEqual([]);
  });
});
