#!/usr/bin/env node
import { createRequire } from "module";
import sade from "sade";

import { logLevelFrom, resolveConfig } from "./config.js";
import { createPost, deletePost, parseTags, updatePost } from "./content.js";
import { generate } from "./generate.js";
import { createLogger } from "./logger.js";
import { serve } from "./serve.js";
import { SiteConfig } from "./typings.js";

const require = createRequire(import.meta.url);
const { version }: { version: string } = require("../package.json");

const logger = createLogger(logLevelFrom());

interface SiteOptions {
  "base-url"?: string;
  title?: string;
}

interface ServeOptions extends SiteOptions {
  port: number;
}

interface PostOptions {
  root: string;
  title?: string;
  content?: string;
  tags?: string;
  date?: string;
}

// mri turns numeric-looking values into numbers
function str(value: unknown): string | undefined {
  return value === undefined || value === true ? undefined : String(value);
}

function config(root: string | undefined, options: SiteOptions): SiteConfig {
  return resolveConfig(root || ".", process.env, {
    baseUrl: str(options["base-url"]),
    title: str(options.title),
  });
}

function run(action: () => void) {
  try {
    action();
  } catch (err) {
    logger.error({ err }, err instanceof Error ? err.message : "command failed");
    process.exitCode = 1;
  }
}

function preview(site: SiteConfig, port: number) {
  const { server, stop } = serve(site, port, logger);
  server.on("close", () => process.stdin.pause());

  process.stdin.on("data", (e) => {
    if (e.toString().startsWith("q")) {
      stop().catch((err) => {
        logger.error({ err }, "failed to stop");
        process.exitCode = 1;
      });
    }
  });
}

const prog = sade("tagpress").version(version).describe("Static blog generator with tag pages.");

prog
  .command("build [root]", "", { default: true })
  .describe("Render content/posts into output/ using templates/")
  .option("--base-url", "Prefix for every link (default: $BASE_URL)")
  .option("--title", "Site title (default: $SITE_TITLE or Blog)")
  .example("build")
  .example("build my-blog --base-url https://example.com/blog")
  .action((root: string | undefined, options: SiteOptions) => {
    run(() => {
      generate(config(root, options), logger);
    });
  });

prog
  .command("serve [root]")
  .describe("Build, preview and rebuild on changes")
  .option("--base-url", "Prefix for every link (default: $BASE_URL)")
  .option("--title", "Site title (default: $SITE_TITLE or Blog)")
  .option("-p, --port", "Port to listen on", 5000)
  .action((root: string | undefined, options: ServeOptions) => {
    run(() => preview(config(root, options), Number(options.port)));
  });

prog
  .command("new <title>")
  .describe("Create content/posts/<slug>.md")
  .option("-r, --root", "Site root", ".")
  .option("-c, --content", "Markdown body", "")
  .option("-t, --tags", "Comma-separated tags")
  .option("-d, --date", "Date as YYYY-MM-DD (default: today)")
  .example('new "Hello World" --tags intro,test --content "# Hi"')
  .action((title: string, options: PostOptions) => {
    run(() => {
      const tags = str(options.tags);
      const { file } = createPost(resolveConfig(options.root).contentDir, {
        title: String(title),
        content: str(options.content) ?? "",
        tags: tags === undefined ? [] : parseTags(tags),
        date: str(options.date),
      });
      logger.info({ file }, "created post");
    });
  });

prog
  .command("edit <slug>")
  .describe("Change the title, tags or body of a post")
  .option("-r, --root", "Site root", ".")
  .option("--title", "New title")
  .option("-c, --content", "New Markdown body, replacing the old one")
  .option("-t, --tags", "New comma-separated tags")
  .action((slug: string, options: PostOptions) => {
    run(() => {
      const tags = str(options.tags);
      const { file } = updatePost(resolveConfig(options.root).contentDir, String(slug), {
        title: str(options.title),
        content: str(options.content),
        tags: tags === undefined ? undefined : parseTags(tags),
      });
      logger.info({ file }, "updated post");
    });
  });

prog
  .command("rm <slug>")
  .describe("Delete a post")
  .option("-r, --root", "Site root", ".")
  .action((slug: string, options: PostOptions) => {
    run(() => {
      const { file } = deletePost(resolveConfig(options.root).contentDir, String(slug));
      logger.info({ file }, "deleted post");
    });
  });

prog.parse(process.argv);
