export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config/engine.js";
export * from "./graph/model.js";
export * from "./graph/loader.js";
export * from "./graph/samples.js";
export * from "./structures/minHeap.js";
export * from "./structures/unionFind.js";
export * from "./trace/types.js";
export * from "./trace/recorder.js";
export * from "./trace/path.js";
export * from "./algorithms/index.js";
