// core
export * from "./core/process";
export * from "./core/unit";
export * from "./core/state";
export * from "./core/metrics";
export * from "./core/errors";

// engine
export * from "./engine/policy";
export * from "./engine/slice";
export * from "./engine/assign";
export * from "./engine/tick";
export * from "./engine/metrics";

// io
export * from "./io/input";
export * from "./io/feed";
export * from "./io/output";

// runner
export * from "./simulate";
export * from "./config";
export * from "./program";
