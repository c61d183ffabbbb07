export * from "./json.js";
export * from "./errors.js";
export * from "./hex.js";
export * from "./http.js";
export * from "./network.js";
export * from "./rpc.js";
export * from "./daemon.js";
export * from "./cookie.js";
