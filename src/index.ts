export * from "./typings.js";
export * from "./errors.js";
export { splitMatter, decodeMetadata, loadMatter, stringifyMatter } from "./matter.js";
export type { Matter } from "./matter.js";
export { parse as renderMarkdown } from "./marked.js";
export { assemblePost, parseMarkdown, readPosts, slugFromPath } from "./post.js";
export type { PostParts } from "./post.js";
export { compile, createHelpers, escape, loadTemplates } from "./template.js";
export type { Helpers, IndexContext, LayoutContext, PostContext, Render, TagContext, Templates } from "./template.js";
export { buildTagIndex, renderIndex, renderPosts, renderSite, renderTags, tagDocumentId } from "./compose.js";
export { generate } from "./generate.js";
export type { GenerateResult } from "./generate.js";
export { resolveConfig, parseEnv } from "./config.js";
export type { ConfigOverrides, EnvConfig } from "./config.js";
export { createPost, deletePost, formatDate, parseTags, updatePost } from "./content.js";
export type { NewPost, PostChanges, PostFile } from "./content.js";
export { serve } from "./serve.js";
export type { Preview } from "./serve.js";
