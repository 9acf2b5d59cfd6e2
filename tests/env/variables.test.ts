import { describe, expect, it } from "vitest";
import { parseEnvironmentConfig } from "../../src/env/config.js";
import {
  buildVariables,
  expandPath,
  expandVariables,
  type HostInfo,
} from "../../src/env/variables.js";
import { ResolutionError } from "../../src/errors/TextRefError.js";

const host: HostInfo = {
  platform: "linux",
  env: {},
  home: "/home/ann",
  cwd: "/work",
  tmp: "/tmp",
  hostname: "box",
  osname: "Linux",
  username: "ann",
};

describe("buildVariables", () => {
  it("should combine host facts, platform directories and config variables", () => {
    const config = parseEnvironmentConfig({
      appname: "notes",
      version: "1.2.0",
      variables: { rows: "%user_data_dir%/rows" },
    });
    const table = buildVariables(config, host);

    expect(table).toMatchObject({
      home: "/home/ann",
      cwd: "/work",
      tmp_dir: "/tmp",
      hostname: "box",
      username: "ann",
      appname: "notes",
      version: "1.2.0",
      user_data_dir: "/home/ann/.local/share/notes",
      rows: "%user_data_dir%/rows",
    });
    expect(table.appauthor).toBeUndefined();
    expect(Object.isFrozen(table)).toBe(true);
  });
});

describe("expandVariables", () => {
  it("should expand nested placeholders", () => {
    const variables = { root: "/srv", data: "%root%/data", file: "%data%/x.txt" };
    expect(expandVariables("%file%", variables)).toBe("/srv/data/x.txt");
  });

  it("should leave lone percent signs alone", () => {
    expect(expandVariables("100% done", {})).toBe("100% done");
  });

  it("should name every unknown variable", () => {
    expect(() => expandVariables("%a%/%b%/%a%", {})).toThrow(
      'Unknown variables %a%, %b% in "%a%/%b%/%a%"',
    );
  });

  it("should detect cyclic definitions", () => {
    const variables = { a: "%b%", b: "%a%" };
    expect(() => expandVariables("%a%", variables)).toThrow(ResolutionError);
    expect(() => expandVariables("%a%", variables)).toThrow(/cyclic definition/);
  });
});

describe("expandPath", () => {
  it("should expand config variables into absolute paths", () => {
    const table = buildVariables(
      parseEnvironmentConfig({ appname: "notes", variables: { rows: "%user_data_dir%/rows" } }),
      host,
    );
    expect(expandPath("%rows%/a.txt", table)).toBe("/home/ann/.local/share/notes/rows/a.txt");
    expect(expandPath("notes.txt", table)).toBe("/work/notes.txt");
    expect(expandPath("%home%/../shared/./x", table)).toBe("/home/shared/x");
  });

  it("should expand a leading tilde", () => {
    expect(expandPath("~/x.txt", { home: "/h" })).toBe("/h/x.txt");
    expect(expandPath("~", { home: "/h" })).toBe("/h");
  });
});
