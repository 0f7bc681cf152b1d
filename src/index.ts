export * from "./graph/model.js";
export * from "./graph/document.js";
export * from "./graph/demo.js";
export * from "./algorithms/index.js";
export * from "./report.js";
export * from "./logger.js";
export { loadRuntimeConfig, type RuntimeConfig, type AlgorithmChoice, type OutputFormat } from "./config/runtime.js";
export { ERROR_CODES, PathlabError, describeError, type ErrorCode, type DescribedError } from "./types.js";
