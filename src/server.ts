import { z } from "zod";

import { loadConfig } from "./config.js";
import { WordCountTrie } from "./core/impl/index.js";
import { createDictionary } from "./http/dictionary.js";
import { startServer } from "./http/server.js";
import { createLogger } from "./logger.js";
import { loadTrie, saveTrie } from "./storage/snapshotFile.js";

const log = createLogger("main");
const config = loadConfig();

const trie = new WordCountTrie({ lowercase: config.LOWERCASE });
if (config.SNAPSHOT_PATH) {
  try {
    await loadTrie(trie, config.SNAPSHOT_PATH, { symbol: z.string(), value: z.number().int().nonnegative() });
  } catch (e) {
    if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) throw e;
    log.info({ path: config.SNAPSHOT_PATH }, "no snapshot yet, starting empty");
  }
}

const { server, port } = await startServer({
  port: config.PORT,
  dictionary: createDictionary(trie),
  maxEditDistance: config.MAX_EDIT_DISTANCE,
});

function shutdown(): void {
  server.close(() => {
    const done = config.SNAPSHOT_PATH ? saveTrie(trie, config.SNAPSHOT_PATH) : Promise.resolve();
    done.then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, "failed to save snapshot");
        process.exit(1);
      },
    );
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

log.info({ port, keys: trie.size }, "listening");
