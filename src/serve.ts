import { FSWatcher, watch } from "chokidar";
import { createServer, Server } from "http";
import sirv from "sirv";

import { generate } from "./generate.js";
import type { Logger } from "./logger.js";
import { SiteConfig } from "./typings.js";

export interface Preview {
  server: Server;
  watcher: FSWatcher;
  stop(): Promise<void>;
}

/**
 * Build the site, serve `outDir` and rebuild whenever a post or template
 * changes. A failed rebuild is logged and the old output stays up.
 */
export function serve(site: SiteConfig, port: number, logger: Logger): Preview {
  generate(site, logger);

  function rebuild(event: string, file: string) {
    logger.info({ event, file }, "rebuilding");
    try {
      generate(site, logger);
    } catch (err) {
      logger.error({ err }, "rebuild failed");
    }
  }

  const watcher = watch([site.contentDir, site.templatesDir], {
    ignored: ["**/.git/**", "**/node_modules/**"],
    ignoreInitial: true,
    ignorePermissionErrors: true,
    depth: 0,
  });
  watcher.on("all", rebuild);

  const server = createServer(sirv(site.outDir, { dev: true }));

  async function stop() {
    await watcher.close();
    server.close();
  }

  server.on("error", (err) => {
    logger.error({ err }, `cannot serve on port ${port}`);
    process.exitCode = 1;
    stop().catch((closeErr) => logger.error({ err: closeErr }, "failed to stop"));
  });
  server.listen(port, () => {
    logger.info(`previewing at http://localhost:${port}, type q to quit`);
  });

  return { server, watcher, stop };
}
