import { existsSync, readFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import YAML from "yaml";
import { z, type ZodError } from "zod";
import { ConfigError } from "../errors/TextRefError.js";

const VARIABLE_NAME = /^\w+$/;

export const EnvironmentConfigSchema = z.object({
  appname: z.string().min(1).default("textref"),
  appauthor: z.string().min(1).optional(),
  version: z.string().optional(),
  variables: z
    .record(
      z.string().regex(VARIABLE_NAME, "variable names may only contain letters, digits and _"),
      z.string(),
    )
    .default({}),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;
export type EnvironmentConfigInput = z.input<typeof EnvironmentConfigSchema>;

const DEFAULT_CONFIG_NAME = "textref.config";
const DEFAULT_CONFIG_FORMATS = ["yaml", "yml", "json"];

/**
 * Validates a raw config object, filling in defaults.
 */
export function parseEnvironmentConfig(raw: unknown, source = "config"): EnvironmentConfig {
  const parsed = EnvironmentConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`The ${source} is not valid:\n${formatZodError(parsed.error)}`, {
      details: { source },
    });
  }
  return parsed.data;
}

/**
 * Loads the environment config from a YAML or JSON file.
 *
 * With an explicit `path` the file must exist. Without one, `textref.config.yaml`,
 * `.yml` and `.json` are tried in the working directory, and the defaults are
 * returned when none of them exists.
 */
export function loadEnvironmentConfig(path: string | null, cwd = process.cwd()): EnvironmentConfig {
  let filePath: string | null = null;
  if (path) {
    filePath = resolve(cwd, path);
    if (!existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${path}`, { details: { path: filePath } });
    }
  } else {
    filePath =
      DEFAULT_CONFIG_FORMATS.map((format) => resolve(cwd, `${DEFAULT_CONFIG_NAME}.${format}`)).find(
        (candidate) => existsSync(candidate),
      ) ?? null;
    if (filePath === null) {
      return parseEnvironmentConfig({});
    }
  }

  const content = readFileSync(filePath, { encoding: "utf-8" });
  const format = extname(filePath).slice(1);

  let result: unknown;
  try {
    if (format === "json") {
      result = JSON.parse(content);
    } else if (format === "yaml" || format === "yml") {
      result = YAML.parse(content);
    } else {
      throw new ConfigError(`Invalid config file format: ${format}`, { details: { path: filePath } });
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Could not parse config file ${filePath}`, {
      details: { path: filePath },
      cause: error,
    });
  }

  return parseEnvironmentConfig(result, `config file ${filePath}`);
}

/**
 * Formats a Zod error into a readable string
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return `  - ${path || "root"}: ${issue.message}`;
    })
    .join("\n");
}
