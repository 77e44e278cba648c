import { buildSync } from "esbuild";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";

import { renderSite } from "./compose.js";
import { describeError, IOError, TagpressError } from "./errors.js";
import type { Logger } from "./logger.js";
import { readPosts } from "./post.js";
import { loadTemplates } from "./template.js";
import { OutputDocument, Post, SiteConfig } from "./typings.js";

export interface GenerateResult {
  posts: Post[];
  documents: OutputDocument[];
  style: boolean;
}

function writeDocuments(outDir: string, documents: OutputDocument[], logger?: Logger) {
  try {
    mkdirSync(outDir, { recursive: true });
  } catch (err) {
    throw new IOError(outDir, "Cannot create output directory", { cause: err });
  }
  for (const { id, html } of documents) {
    const output = join(outDir, `${id}.html`);
    try {
      writeFileSync(output, html);
    } catch (err) {
      throw new IOError(output, "Cannot write document", { cause: err });
    }
    logger?.debug({ output }, "wrote document");
  }
}

/** Bundle `templates/style.css` into the output, or drop a stale copy. */
function writeStyle(templatesDir: string, outDir: string): boolean {
  const input = join(templatesDir, "style.css");
  const output = join(outDir, "style.css");
  if (!existsSync(input)) {
    rmSync(output, { force: true, maxRetries: 3 });
    return false;
  }
  try {
    buildSync({ entryPoints: [input], bundle: true, outfile: output, logLevel: "silent" });
  } catch (err) {
    throw new TagpressError(`Cannot bundle ${input}: ${describeError(err)}`, { cause: err });
  }
  return true;
}

/**
 * One generation run. Every post is read and every page rendered before the
 * first file is written, so a bad post or template leaves `outDir` untouched.
 */
export function generate(config: SiteConfig, logger?: Logger): GenerateResult {
  const { baseUrl, title, contentDir, templatesDir, outDir } = config;

  const templates = loadTemplates(templatesDir);
  const posts = readPosts(contentDir, baseUrl);
  const documents = renderSite(posts, templates, { baseUrl, title });

  writeDocuments(outDir, documents, logger);
  const style = writeStyle(templatesDir, outDir);

  logger?.info({ posts: posts.length, documents: documents.length, outDir }, "site generated");
  return { posts, documents, style };
}
