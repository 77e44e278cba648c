import { readdirSync, readFileSync } from "fs";
import { basename, join } from "path";

import { IOError } from "./errors.js";
import { parse } from "./marked.js";
import { decodeMetadata, splitMatter } from "./matter.js";
import { Metadata, Post } from "./typings.js";

export const EXTENSION = ".md";

/** @internal */
class _Post implements Post {
  declare readonly slug: string;
  declare readonly title: string;
  declare readonly date: string;
  declare readonly tags: readonly string[];
  declare readonly text: string;
  declare readonly content: string;
  declare readonly baseUrl: string;
  constructor(slug: string, { title, date, tags }: Metadata, text: string, content: string, baseUrl: string) {
    this.slug = slug;
    this.title = title;
    this.date = date;
    this.tags = Object.freeze([...tags]);
    this.text = text;
    this.content = content;
    this.baseUrl = baseUrl;
    Object.freeze(this);
  }
}

/** `content/posts/hello-world.md` -> `hello-world` */
export function slugFromPath(file: string): string {
  return basename(file, EXTENSION);
}

export interface PostParts {
  slug: string;
  metadata: Metadata;
  text: string;
  content: string;
  baseUrl: string;
}

export function assemblePost({ slug, metadata, text, content, baseUrl }: PostParts): Post {
  return new _Post(slug, metadata, text, content, baseUrl);
}

/** Split, decode and render one post's source text. */
export function parseMarkdown(slug: string, raw: string, baseUrl = "", source = `${slug}${EXTENSION}`): Post {
  const { matter, body } = splitMatter(raw, source);
  const metadata = decodeMetadata(matter, source);
  return assemblePost({ slug, metadata, text: body, content: parse(body), baseUrl });
}

/**
 * Read every `*.md` file directly inside `dir`, in file name order.
 * Stops at the first file that cannot be read or parsed.
 */
export function readPosts(dir: string, baseUrl: string): Post[] {
  let names: string[];
  try {
    names = readdirSync(dir, { withFileTypes: true })
      .filter((entry) => !entry.isDirectory() && entry.name.endsWith(EXTENSION))
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  } catch (err) {
    throw new IOError(dir, "Cannot read content directory", { cause: err });
  }

  return names.map((name) => {
    const file = join(dir, name);
    let raw: string;
    try {
      raw = readFileSync(file, "utf-8");
    } catch (err) {
      throw new IOError(file, "Cannot read post", { cause: err });
    }
    return parseMarkdown(slugFromPath(file), raw, baseUrl, file);
  });
}
