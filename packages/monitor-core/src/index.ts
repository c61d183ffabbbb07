export * from "./snapshot.js";
export * from "./signal.js";
export * from "./task.js";
export * from "./poller.js";
export * from "./animator.js";
export * from "./result.js";
export * from "./miner.js";
export * from "./lookup.js";
export * from "./navigation.js";
export * from "./search.js";
export * from "./session.js";
export * from "./format.js";
