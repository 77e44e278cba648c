import { TagpressError } from "./errors.js";
import { createHelpers, Helpers, Templates } from "./template.js";
import { OutputDocument, Post, Site } from "./typings.js";

export const INDEX_ID = "index";
export const TAG_PREFIX = "tag-";

/** Output name of a tag page. Not sanitized: `/` or `..` in a tag land in the path as-is. */
export function tagDocumentId(tag: string): string {
  return `${TAG_PREFIX}${tag}`;
}

function page(templates: Templates, helpers: Helpers, site: Site, title: string, body: string): string {
  return templates.layout({ site, title, body }, helpers);
}

export function renderPosts(posts: readonly Post[], templates: Templates, site: Site): OutputDocument[] {
  const helpers = createHelpers(site);
  return posts.map((post) => ({
    id: post.slug,
    html: page(templates, helpers, site, post.title, templates.post({ site, post }, helpers)),
  }));
}

export function renderIndex(posts: readonly Post[], templates: Templates, site: Site): OutputDocument {
  const helpers = createHelpers(site);
  return {
    id: INDEX_ID,
    html: page(templates, helpers, site, site.title, templates.index({ site, posts }, helpers)),
  };
}

/**
 * Group posts by tag in one pass. Tags keep first-seen order and each group
 * keeps the order of `posts`; a post with N distinct tags lands in N groups.
 */
export function buildTagIndex(posts: readonly Post[]): Map<string, Post[]> {
  const tags = new Map<string, Post[]>();
  for (const post of posts) {
    for (const tag of new Set(post.tags)) {
      let group = tags.get(tag);
      if (!group) tags.set(tag, (group = []));
      group.push(post);
    }
  }
  return tags;
}

export function renderTags(posts: readonly Post[], templates: Templates, site: Site): OutputDocument[] {
  const helpers = createHelpers(site);
  const documents: OutputDocument[] = [];
  for (const [tag, group] of buildTagIndex(posts)) {
    documents.push({
      id: tagDocumentId(tag),
      html: page(templates, helpers, site, tag, templates.tag({ site, tag, posts: group }, helpers)),
    });
  }
  return documents;
}

/**
 * Every document of a site: posts, then the index, then tags. Fails when two
 * documents would be written to the same file, e.g. `index.md` and the index.
 */
export function renderSite(posts: readonly Post[], templates: Templates, site: Site): OutputDocument[] {
  const documents = [...renderPosts(posts, templates, site), renderIndex(posts, templates, site), ...renderTags(posts, templates, site)];
  const sources = [
    ...posts.map((post) => `post "${post.slug}"`),
    "the index",
    ...[...buildTagIndex(posts).keys()].map((tag) => `tag "${tag}"`),
  ];

  const seen = new Map<string, string>();
  documents.forEach(({ id }, i) => {
    const first = seen.get(id);
    if (first !== undefined) {
      throw new TagpressError(`Both ${first} and ${sources[i]} would be written to ${id}.html`);
    }
    seen.set(id, sources[i]);
  });
  return documents;
}
