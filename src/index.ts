// File references, connectors and text helpers
export * from "./io/index.js";

// Environment and path variables
export * from "./env/index.js";

// Errors
export {
  ConfigError,
  EnvironmentError,
  FileAccessError,
  InvalidModeError,
  InvalidStreamError,
  ResolutionError,
  TextRefError,
  UnsupportedOperationError,
} from "./errors/TextRefError.js";

// Tracing
export * from "./tracer/index.js";
