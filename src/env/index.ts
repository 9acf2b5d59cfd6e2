export {
  EnvironmentConfigSchema,
  formatZodError,
  loadEnvironmentConfig,
  parseEnvironmentConfig,
} from "./config.js";
export type { EnvironmentConfig, EnvironmentConfigInput } from "./config.js";
export { getPlatformDirs } from "./dirs.js";
export type { AppIdentity, PlatformDirs } from "./dirs.js";
export { getVariable, getVariables, initEnvironment, resetEnvironment } from "./environment.js";
export { buildVariables, currentHost, expandPath, expandVariables } from "./variables.js";
export type { HostInfo, VariableTable } from "./variables.js";
