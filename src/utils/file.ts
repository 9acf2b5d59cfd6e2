import { FilePathInfo } from "./types.js";

/**
 * Splits a path into directory, stem and extension. Only the last extension
 * counts: "archive.tar.gz" has stem "archive.tar". Dotfiles such as ".env"
 * have no extension. Returns null for paths without a file name ("/").
 */
export function pathToComponents(fullpath: string): FilePathInfo | null {
  const regex = /(?<name>[^\\/]+?)(?<extension>\.[^\\/.]*)?$/;
  const matches = fullpath.match(regex);
  if (matches && matches.groups) {
    const stem = matches.groups.name;
    const ext = matches.groups.extension ?? "";
    return {
      abs: fullpath,
      dir: fullpath.slice(0, fullpath.length - matches[0].length),
      ext,
      stem,
      name: stem + ext,
    };
  }
  return null;
}
