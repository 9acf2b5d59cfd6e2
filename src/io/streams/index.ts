export { BinaryIOBase, IOBase, TextIOBase, isTextStream, parseMode } from "./base.js";
export type { BinaryMode, OpenMode, ParsedMode, StreamKind, TextMode } from "./base.js";
export { FileBinaryIO, FileTextIO, openFile } from "./file.js";
export type { OpenFileOptions } from "./file.js";
export { BytesIO, StringTextIO } from "./memory.js";
