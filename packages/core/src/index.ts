export * from "./autoFollow.js";
export * from "./config.js";
export * from "./defaults.js";
export * from "./logger.js";
export * from "./metadata.js";
export * from "./reconcile.js";
export * from "./refreshScheduler.js";
export * from "./registry.js";
export * from "./revisionWatcher.js";
export * from "./session.js";
export * from "./snapshot.js";
export * from "./transport/index.js";
export * from "./turns.js";
export * from "./utils.js";
export * from "./window.js";
