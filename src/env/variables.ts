import * as os from "node:os";
import { isAbsolute, normalize, resolve } from "node:path";
import { ResolutionError } from "../errors/TextRefError.js";
import type { EnvironmentConfig } from "./config.js";
import { getPlatformDirs } from "./dirs.js";

export type VariableTable = Readonly<Record<string, string>>;

/**
 * Host facts the variable table is built from. Defaults come from `node:os`
 * and `process`; tests pass their own.
 */
export interface HostInfo {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
  home: string;
  cwd: string;
  tmp: string;
  hostname: string;
  osname: string;
  username: string;
}

export function currentHost(): HostInfo {
  let username: string;
  try {
    username = os.userInfo().username;
  } catch {
    // no passwd entry for the current uid (containers)
    username = process.env.USER ?? process.env.USERNAME ?? "";
  }
  return {
    platform: process.platform,
    env: process.env,
    home: os.homedir(),
    cwd: process.cwd(),
    tmp: os.tmpdir(),
    hostname: os.hostname(),
    osname: os.type(),
    username,
  };
}

/**
 * Builds the frozen name -> value table consulted by `%name%` expansion.
 * Config variables come last and may override the built-in ones.
 */
export function buildVariables(config: EnvironmentConfig, host: HostInfo = currentHost()): VariableTable {
  const dirs = getPlatformDirs(config, host.platform, host.env, host.home);
  const table: Record<string, string> = {
    home: host.home,
    cwd: host.cwd,
    tmp_dir: host.tmp,
    hostname: host.hostname,
    osname: host.osname,
    username: host.username,
    appname: config.appname,
    ...(config.appauthor !== undefined && { appauthor: config.appauthor }),
    ...(config.version !== undefined && { version: config.version }),
    ...dirs,
    ...config.variables,
  };
  return Object.freeze(table);
}

const PLACEHOLDER = /%(\w+)%/g;
const MAX_EXPANSION_DEPTH = 16;

/**
 * Replaces `%name%` placeholders in `input` with values from `variables`.
 * Values may themselves contain placeholders; they are expanded until none
 * remain. Unknown names and definitions that refer back to themselves raise a
 * ResolutionError naming them.
 */
export function expandVariables(input: string, variables: VariableTable): string {
  const missing = new Set<string>();
  let current = input;

  for (let depth = 0; depth < MAX_EXPANSION_DEPTH; depth++) {
    let replaced = false;
    current = current.replace(PLACEHOLDER, (match, name: string) => {
      if (Object.prototype.hasOwnProperty.call(variables, name)) {
        replaced = true;
        return variables[name];
      }
      missing.add(name);
      return match;
    });

    if (missing.size > 0) {
      const names = [...missing];
      throw new ResolutionError(
        `Unknown variable${names.length > 1 ? "s" : ""} ${names.map((n) => `%${n}%`).join(", ")} in "${input}"`,
        { details: { input, missing: names } },
      );
    }
    if (!replaced) {
      return current;
    }
  }

  const pending = [...new Set([...current.matchAll(PLACEHOLDER)].map((m) => m[1]))];
  if (pending.length === 0) {
    return current;
  }
  throw new ResolutionError(
    `Could not expand "${input}": cyclic definition of ${pending.map((n) => `%${n}%`).join(", ")}`,
    { details: { input, cyclic: pending } },
  );
}

/**
 * Expands placeholders and a leading `~` in a path, and resolves it against the
 * `cwd` variable (the process working directory when absent).
 */
export function expandPath(path: string, variables: VariableTable): string {
  let expanded = expandVariables(path, variables);

  if (expanded === "~" || expanded.startsWith("~/") || expanded.startsWith("~\\")) {
    const home = variables.home ?? os.homedir();
    expanded = home + expanded.slice(1);
  }

  if (isAbsolute(expanded)) {
    return normalize(expanded);
  }
  return resolve(variables.cwd ?? process.cwd(), expanded);
}
