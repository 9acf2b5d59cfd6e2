import { EnvironmentError } from "../errors/TextRefError.js";
import { parseEnvironmentConfig, type EnvironmentConfigInput } from "./config.js";
import { buildVariables, currentHost, type HostInfo, type VariableTable } from "./variables.js";

let table: VariableTable | undefined;

/**
 * Builds the process-wide variable table. Must run at most once, and before
 * anything reads the table; afterwards the table never changes.
 */
export function initEnvironment(
  config: EnvironmentConfigInput = {},
  host: HostInfo = currentHost(),
): VariableTable {
  if (table !== undefined) {
    throw new EnvironmentError("The environment is already initialized");
  }
  table = buildVariables(parseEnvironmentConfig(config), host);
  return table;
}

/**
 * The process-wide variable table, built from the default config on first use
 * when initEnvironment() was never called.
 */
export function getVariables(): VariableTable {
  return table ?? initEnvironment();
}

export function getVariable(name: string): string | undefined {
  const variables = getVariables();
  return Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : undefined;
}

/** @internal Test hook; the table is otherwise write-once. */
export function resetEnvironment(): void {
  table = undefined;
}
