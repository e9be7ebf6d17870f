export * from "./value-objects/ids";
export * from "./value-objects/reserved-names";

export * from "./entities/snapshot";
export * from "./entities/tag";
export * from "./entities/sync-manifest";
export * from "./entities/diff-result";
