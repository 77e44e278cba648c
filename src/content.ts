import { slug as githubSlug } from "github-slugger";
import { mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { basename, join } from "path";

import { IOError, TagpressError } from "./errors.js";
import { loadMatter, splitMatter, stringifyMatter } from "./matter.js";
import { EXTENSION } from "./post.js";

export interface NewPost {
  title: string;
  content: string;
  tags?: string[];
  /** default: today, local time */
  date?: string;
}

export interface PostChanges {
  title?: string;
  content?: string;
  tags?: string[];
}

export interface PostFile {
  slug: string;
  file: string;
}

/** `"intro, test,,"` -> `["intro", "test"]` */
export function parseTags(value: string): string[] {
  return value
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean);
}

export function formatDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function body(content: string): string {
  return `\n${content}${content.endsWith("\n") ? "" : "\n"}`;
}

function postFile(contentDir: string, slug: string): string {
  if (!slug || basename(slug) !== slug || slug === "." || slug === "..") {
    throw new TagpressError(`Invalid slug: ${JSON.stringify(slug)}`);
  }
  return join(contentDir, `${slug}${EXTENSION}`);
}

/** Write a new post to `{contentDir}/{slug}.md`, never replacing an existing one. */
export function createPost(contentDir: string, post: NewPost, now = new Date()): PostFile {
  const slug = githubSlug(post.title);
  const file = postFile(contentDir, slug);
  const text = stringifyMatter(
    { title: post.title, date: post.date || formatDate(now), tags: post.tags ?? [] },
    body(post.content)
  );
  try {
    mkdirSync(contentDir, { recursive: true });
    writeFileSync(file, text, { flag: "wx" });
  } catch (err) {
    throw new IOError(file, "Cannot create post", { cause: err });
  }
  return { slug, file };
}

/**
 * Replace the given fields of an existing post. Other metadata keys are kept;
 * new content replaces the whole body.
 */
export function updatePost(contentDir: string, slug: string, changes: PostChanges): PostFile {
  const file = postFile(contentDir, slug);
  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch (err) {
    throw new IOError(file, "Cannot read post", { cause: err });
  }

  const split = splitMatter(raw, file);
  const data = loadMatter(split.matter, file);
  if (changes.title !== undefined) data.title = changes.title;
  if (changes.tags !== undefined) data.tags = changes.tags;
  const text = stringifyMatter(data, changes.content !== undefined ? body(changes.content) : split.body);

  try {
    writeFileSync(file, text);
  } catch (err) {
    throw new IOError(file, "Cannot write post", { cause: err });
  }
  return { slug, file };
}

export function deletePost(contentDir: string, slug: string): PostFile {
  const file = postFile(contentDir, slug);
  try {
    rmSync(file);
  } catch (err) {
    throw new IOError(file, "Cannot delete post", { cause: err });
  }
  return { slug, file };
}
