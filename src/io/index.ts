export {
  FileConnector,
  PathConnector,
  StreamConnector,
  isConnector,
  resolveConnector,
} from "./connector.js";
export type { Connector, ConnectorOptions, FileRef } from "./connector.js";
export { getComment, getContent, getName, load, openx, save } from "./plain.js";
export type { TextOptions } from "./plain.js";
export * from "./streams/index.js";
