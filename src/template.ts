import { readFileSync } from "fs";
import { join } from "path";

import { describeError, TemplateError } from "./errors.js";
import { Post, Site } from "./typings.js";

interface Part {
  raw?: string;
  expr?: string;
}

function nextMustacheTag(template: string) {
  let i = template.indexOf("{");
  // { expr } -> eval(expr)
  // {{ expr }} -> '{ expr }'
  if (i !== -1) {
    if (template[i + 1] === "{") {
      let j = template.indexOf("}}", i + 2);
      if (j !== -1) {
        return {
          head: template.slice(0, i),
          tail: template.slice(j + 2),
          raw: template.slice(i + 1, j + 1),
        };
      }
    }
    let j = template.indexOf("}", i + 1);
    if (j !== -1) {
      return {
        head: template.slice(0, i),
        tail: template.slice(j + 1),
        expr: template.slice(i + 1, j),
      };
    }
  }
}

function isControl(part: Part) {
  return part.expr !== undefined && /^[#/@]/.test(part.expr);
}

function parse(template: string): Part[] {
  const parts: Part[] = [];
  let indent_size = 4;
  function update_indent_size(raw: string) {
    const m = raw.match(/^ */);
    const l = m && m[0].length;
    l && (indent_size = Math.min(indent_size, l));
  }
  while (true) {
    const tag = nextMustacheTag(template);
    if (tag === undefined) {
      parts.push({ raw: template });
      update_indent_size(template);
      break;
    }
    parts.push({ raw: tag.head });
    update_indent_size(tag.head);
    if (tag.raw) {
      parts.push({ raw: tag.raw });
      update_indent_size(tag.raw);
    }
    if (tag.expr) {
      parts.push({ expr: tag.expr });
    }
    template = tag.tail;
  }
  // remove extra newline and indent from expr closures {#expr}...{/expr}
  let indent = 0;
  let last2: Part[] = [{}, {}];
  for (const part of parts) {
    if (part.raw && indent) {
      // only text right after a control tag loses its leading newline
      if (isControl(last2[1])) part.raw = part.raw.trimStart();
      part.raw = part.raw.replace(new RegExp(`^ {${indent * indent_size}}`, "gm"), "");
    }
    if (part.expr && part.expr[0] === "#" && !part.expr.startsWith("#else")) {
      indent++;
      // remove extra space between {/last}...{#current}
      if (last2[0].expr && last2[0].expr[0] === "/" && last2[1].raw) {
        last2[1].raw = last2[1].raw.trimEnd();
      }
    }
    if (part.expr && part.expr[0] === "/") {
      indent--;
    }
    last2.push(part);
    last2.shift();
  }
  return parts;
}

export function escape(value: unknown): string {
  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export interface Helpers {
  escape(value: unknown): string;
  /** `site.baseUrl` joined to `path` by exactly one slash */
  url(path: string): string;
}

export function createHelpers(site: Site): Helpers {
  const base = site.baseUrl.replace(/\/+$/, "");
  return {
    escape,
    url: (path) => `${base}/${path.replace(/^\/+/, "")}`,
  };
}

export type Render<T> = (context: T, helpers: Helpers) => string;

/**
 * Compile `template` into a render function taking `argument` (a destructuring
 * pattern such as `"{ site, post }"`) and the helpers `{ escape, url }`.
 *
 * Syntax: `{ expr }`, `{{ literal }}`, `{#each list as x}...{/each}`,
 * `{#if a}...{#else if b}...{#else}...{/if}` and `{@const x = 1}`.
 */
export function compile<T>(template: string, argument: string, name = "<template>"): Render<T> {
  const parts = parse(template);
  let code = `let html = '';`;
  parts.forEach((p) => {
    if (p.raw) {
      code += `html += ${JSON.stringify(p.raw)};`;
    }
    if (p.expr) {
      // expr = ' site.title '
      // expr = '#each posts.slice(0, 20) as post'
      // expr = '#if post.title'
      // expr = '/each' '/if'
      // expr = '@const x = 1'
      if (p.expr.startsWith("#each")) {
        const expr = p.expr.slice(5).trim();
        const [list, x] = expr.split(" as ");
        code += `for (const ${x} of ${list}) {`;
      } else if (p.expr.startsWith("#if")) {
        const expr = p.expr.slice(3).trim();
        code += `if (${expr}) {`;
      } else if (p.expr.startsWith("#else if")) {
        const expr = p.expr.slice(8).trim();
        code += `} else if (${expr}) {`;
      } else if (p.expr.trim() === "#else") {
        code += `} else {`;
      } else if (p.expr.startsWith("/")) {
        code += "}";
      } else if (p.expr.startsWith("@")) {
        const expr = p.expr.slice(1).trim();
        code += `${expr};`;
      } else {
        code += `html += ${p.expr.trim()};`;
      }
    }
  });
  code += `return html;`;

  let fn: Function;
  try {
    fn = new Function(`${argument}, { escape, url }`, code);
  } catch (err) {
    throw new TemplateError(name, `Cannot compile template: ${describeError(err)}`, { cause: err });
  }
  return (context, helpers) => {
    try {
      return String(fn(context, helpers));
    } catch (err) {
      throw new TemplateError(name, `Cannot render template: ${describeError(err)}`, { cause: err });
    }
  };
}

export interface LayoutContext {
  site: Site;
  title: string;
  body: string;
}

export interface PostContext {
  site: Site;
  post: Post;
}

export interface IndexContext {
  site: Site;
  posts: readonly Post[];
}

export interface TagContext {
  site: Site;
  tag: string;
  posts: readonly Post[];
}

export interface Templates {
  layout: Render<LayoutContext>;
  post: Render<PostContext>;
  index: Render<IndexContext>;
  tag: Render<TagContext>;
}

function readTemplate(dir: string, file: string): string {
  try {
    return readFileSync(join(dir, file), "utf-8");
  } catch (err) {
    throw new TemplateError(file, `Cannot read template from ${dir}`, { cause: err });
  }
}

/** Load `layout.html`, `post.html`, `index.html` and `tag.html` from `dir`. */
export function loadTemplates(dir: string): Templates {
  const load = <T>(file: string, argument: string) => compile<T>(readTemplate(dir, file), argument, file);
  return {
    layout: load<LayoutContext>("layout.html", "{ site, title, body }"),
    post: load<PostContext>("post.html", "{ site, post }"),
    index: load<IndexContext>("index.html", "{ site, posts }"),
    tag: load<TagContext>("tag.html", "{ site, tag, posts }"),
  };
}
