import { posix, win32 } from "node:path";

export interface AppIdentity {
  appname: string;
  appauthor?: string;
}

export interface PlatformDirs {
  user_data_dir: string;
  user_config_dir: string;
  user_cache_dir: string;
  user_log_dir: string;
  site_data_dir: string;
  site_config_dir: string;
}

type Env = Record<string, string | undefined>;

// First entry of a colon separated XDG search path
function firstOf(list: string | undefined): string | undefined {
  return list?.split(":").find((entry) => entry.length > 0);
}

/**
 * Per-application directories following the conventions of each platform:
 * XDG base directories on Linux and other unixes, `~/Library` on macOS,
 * `%LOCALAPPDATA%` and `%PROGRAMDATA%` on Windows.
 */
export function getPlatformDirs(
  app: AppIdentity,
  platform: NodeJS.Platform,
  env: Env,
  home: string,
): PlatformDirs {
  const { appname } = app;

  if (platform === "win32") {
    const join = win32.join;
    const owner = app.appauthor ?? appname;
    const local = env.LOCALAPPDATA ?? join(home, "AppData", "Local");
    const common = env.PROGRAMDATA ?? "C:\\ProgramData";
    const userData = join(local, owner, appname);
    return {
      user_data_dir: userData,
      user_config_dir: userData,
      user_cache_dir: join(userData, "Cache"),
      user_log_dir: join(userData, "Logs"),
      site_data_dir: join(common, owner, appname),
      site_config_dir: join(common, owner, appname),
    };
  }

  const join = posix.join;

  if (platform === "darwin") {
    const support = join(home, "Library", "Application Support", appname);
    return {
      user_data_dir: support,
      user_config_dir: support,
      user_cache_dir: join(home, "Library", "Caches", appname),
      user_log_dir: join(home, "Library", "Logs", appname),
      site_data_dir: join("/Library", "Application Support", appname),
      site_config_dir: join("/Library", "Application Support", appname),
    };
  }

  const cache = join(env.XDG_CACHE_HOME || join(home, ".cache"), appname);
  return {
    user_data_dir: join(env.XDG_DATA_HOME || join(home, ".local", "share"), appname),
    user_config_dir: join(env.XDG_CONFIG_HOME || join(home, ".config"), appname),
    user_cache_dir: cache,
    user_log_dir: join(cache, "log"),
    site_data_dir: join(firstOf(env.XDG_DATA_DIRS) ?? "/usr/local/share", appname),
    site_config_dir: join(firstOf(env.XDG_CONFIG_DIRS) ?? "/etc/xdg", appname),
  };
}
