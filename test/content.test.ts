import { readFileSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createPost, deletePost, formatDate, parseTags, updatePost } from "../src/content.js";
import { IOError, TagpressError } from "../src/errors.js";
import { readPosts } from "../src/post.js";
import { removeDir, tempDir, writeFiles } from "./helpers.js";

describe("parseTags", () => {
  it("splits and trims comma-separated tags", () => {
    expect(parseTags(" intro, test,,")).toEqual(["intro", "test"]);
    expect(parseTags("")).toEqual([]);
  });
});

describe("formatDate", () => {
  it("formats a local calendar date", () => {
    expect(formatDate(new Date(2024, 4, 7, 23, 30))).toBe("2024-05-07");
  });
});

describe("post files", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tempDir(), "content/posts");
  });

  afterEach(() => {
    removeDir(join(dir, "../.."));
  });

  it("creates a post that reads back with the same metadata", () => {
    const { slug, file } = createPost(dir, {
      title: "Hello World",
      content: "# Hi",
      tags: ["intro", "test"],
      date: "2024-01-01",
    });

    expect(slug).toBe("hello-world");
    expect(file).toBe(join(dir, "hello-world.md"));
    expect(readFileSync(file, "utf-8")).toBe(
      "---\ntitle: Hello World\ndate: 2024-01-01\ntags: [intro, test]\n---\n\n# Hi\n"
    );

    const [post] = readPosts(dir, "");
    expect(post).toMatchObject({ slug: "hello-world", title: "Hello World", date: "2024-01-01", tags: ["intro", "test"] });
    expect(post.content).toBe('<h1 id="hi">Hi</h1>\n');
  });

  it("dates a new post today by default", () => {
    createPost(dir, { title: "Dated", content: "" }, new Date(2024, 4, 7));
    expect(readPosts(dir, "")[0].date).toBe("2024-05-07");
    expect(readPosts(dir, "")[0].tags).toEqual([]);
  });

  it("never replaces an existing post", () => {
    createPost(dir, { title: "Once", content: "first" });
    expect(() => createPost(dir, { title: "Once", content: "second" })).toThrow(IOError);
    expect(readPosts(dir, "")[0].text).toBe("\nfirst\n");
  });

  it("rejects a title without a usable slug", () => {
    expect(() => createPost(dir, { title: "!!!", content: "" })).toThrow(TagpressError);
  });

  it("updates title and tags and keeps other keys and the body", () => {
    writeFiles(dir, { "old.md": "---\ntitle: Old\ndate: 2024-01-01\nlayout: wide\ntags: [a]\n---\n\nBody text\n" });

    updatePost(dir, "old", { title: "New", tags: ["b", "c"] });

    expect(readFileSync(join(dir, "old.md"), "utf-8")).toBe(
      "---\ntitle: New\ndate: 2024-01-01\nlayout: wide\ntags: [b, c]\n---\n\nBody text\n"
    );
  });

  it("replaces the body when new content is given", () => {
    writeFiles(dir, { "old.md": "---\ntitle: Old\ndate: 2024-01-01\n---\n\nBody text\n\nMore text\n" });

    updatePost(dir, "old", { content: "Fresh" });

    const [post] = readPosts(dir, "");
    expect(post.title).toBe("Old");
    expect(post.text).toBe("\nFresh\n");
  });

  it("fails to update a missing post", () => {
    expect(() => updatePost(dir, "missing", { title: "X" })).toThrow(IOError);
  });

  it("deletes a post once", () => {
    createPost(dir, { title: "Doomed", content: "" });
    deletePost(dir, "doomed");
    expect(readPosts(dir, "")).toEqual([]);
    expect(() => deletePost(dir, "doomed")).toThrow(IOError);
  });

  it("rejects slugs that leave the content directory", () => {
    expect(() => deletePost(dir, "../secret")).toThrow(TagpressError);
    expect(() => updatePost(dir, "..", {})).toThrow(TagpressError);
  });
});
