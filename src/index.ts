export * from "./core/index.js";
export { loadTrie, saveTrie } from "./storage/snapshotFile.js";
export { createDictionary, type Dictionary } from "./http/dictionary.js";
export { createServer, startServer, route, type ServerOptions } from "./http/server.js";
export { loadConfig, type Config } from "./config.js";
