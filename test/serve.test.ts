import { cpSync } from "fs";
import { createServer, Server } from "http";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "../src/logger.js";
import { Preview, serve } from "../src/serve.js";
import { SiteConfig } from "../src/typings.js";
import { HELLO_WORLD, removeDir, TEMPLATES, tempDir, writeFiles } from "./helpers.js";

describe("serve", () => {
  let root: string;
  let config: SiteConfig;
  let blocker: Server;
  let preview: Preview | undefined;

  beforeEach(async () => {
    root = tempDir();
    cpSync(TEMPLATES, join(root, "templates"), { recursive: true });
    config = {
      baseUrl: "",
      title: "Blog",
      contentDir: join(root, "content/posts"),
      templatesDir: join(root, "templates"),
      outDir: join(root, "output"),
    };
    writeFiles(config.contentDir, { "hello-world.md": HELLO_WORLD });
    blocker = createServer();
    await new Promise<void>((resolve) => blocker.listen(0, resolve));
  });

  afterEach(async () => {
    await preview?.stop();
    preview = undefined;
    await new Promise<void>((resolve) => blocker.close(() => resolve()));
    process.exitCode = undefined;
    removeDir(root);
  });

  it("logs a busy port and sets the exit code", async () => {
    const address = blocker.address();
    const port = typeof address === "object" && address !== null ? address.port : 0;
    const logger = createLogger("silent");
    const error = vi.spyOn(logger, "error");

    preview = serve(config, port, logger);
    await new Promise((resolve) => preview?.server.once("error", resolve));

    expect(error).toHaveBeenCalledWith({ err: expect.objectContaining({ code: "EADDRINUSE" }) }, `cannot serve on port ${port}`);
    expect(process.exitCode).toBe(1);
  });
});
