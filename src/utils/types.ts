export interface FilePathInfo {
  abs: string; // Absolute path
  dir: string; // Directory path, with trailing separator
  ext: string; // File extension, "" when there is none
  stem: string; // File name without extension
  name: string; // Full file name
}
