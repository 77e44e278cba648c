import Slugger from "github-slugger";
import hljs from "highlight.js";
import Katex from "katex";
import { marked } from "marked";
import { createRequire } from "module";

const require = /* @__PURE__ */ createRequire(import.meta.url);
const full: Record<string, string> = /* @__PURE__ */ require("markdown-it-emoji/lib/data/full.json");

const EMOJI_CDN = "https://github.githubassets.com/images/icons/emoji/unicode";

let slugger = /* @__PURE__ */ new Slugger();

let renderer: marked.RendererObject = {
  heading(this: marked.Renderer, text, level, raw) {
    if (this.options.headerIds) {
      const id = (this.options.headerPrefix || "") + slugger.slug(raw);
      return `<h${level} id="${id}">${text}</h${level}>\n`;
    }
    return false;
  },
  code(code, lang) {
    if (lang === "math") {
      return `<p>${Katex.renderToString(code, { displayMode: true, throwOnError: false })}</p>`;
    }
    return false;
  },
};

type Extension = marked.TokenizerExtension & marked.RendererExtension;

let math: Extension = {
  name: "math",
  level: "inline",
  start(src) {
    return src.match(/\$\$[^\$]+?\$\$|\$[^\$]+?\$/)?.index;
  },
  tokenizer(src) {
    const matchBlock = /^\$\$([^\$]+?)\$\$/.exec(src);
    if (matchBlock) {
      return {
        type: "math",
        raw: matchBlock[0],
        text: matchBlock[1],
        tokens: [],
        display: true,
      };
    }
    const matchInline = /^\$([^\$]+?)\$/.exec(src);
    if (matchInline) {
      return {
        type: "math",
        raw: matchInline[0],
        text: matchInline[1],
        tokens: [],
        display: false,
      };
    }
  },
  renderer(token) {
    return Katex.renderToString(String(token.text), { displayMode: Boolean(token.display), throwOnError: false });
  },
};

let footnoteList: Extension = {
  name: "footnoteList",
  level: "block",
  start(src) {
    return src.match(/^\[\^\d+\]:/m)?.index;
  },
  tokenizer(src) {
    const match = /^(?:\[\^(\d+)\]:[^\n]*(?:\n|$))+/.exec(src);
    if (match) {
      const text = match[0].trim();
      return {
        type: "footnoteList",
        raw: match[0],
        text,
        tokens: this.lexer.inline(text, []),
      };
    }
  },
  renderer(token) {
    const fragment = this.parser.parseInline(token.tokens ?? []);
    return `<section class="footnotes"><ol dir="auto">${fragment}</ol></section>\n`;
  },
};

let footnote: Extension = {
  name: "footnote",
  level: "inline",
  start(src) {
    return src.match(/\[\^\d+\]/)?.index;
  },
  tokenizer(src) {
    const matchList = /^\[\^(\d+)\]:([^\n]*)(?:\n|$)/.exec(src);
    if (matchList) {
      return {
        type: "footnote",
        raw: matchList[0],
        id: parseInt(matchList[1]),
        tokens: this.lexer.inlineTokens(matchList[2].trim(), []),
        def: true,
      };
    }
    const matchInline = /^\[\^(\d+)\]/.exec(src);
    if (matchInline) {
      return {
        type: "footnote",
        raw: matchInline[0],
        id: parseInt(matchInline[1]),
        tokens: [],
        def: false,
      };
    }
  },
  renderer(token) {
    if (!token.def) {
      return `<sup><a href="#fn-${token.id}" id="fnref-${token.id}">${token.id}</a></sup>`;
    }
    const fragment = this.parser.parseInline(token.tokens ?? []);
    return `<li id="fn-${token.id}"><p dir="auto">${fragment} <a href="#fnref-${token.id}" class="footnote-backref" aria-label="Back to content">&#8617;</a></p></li>`;
  },
};

let emoji: Extension = {
  name: "emoji",
  level: "inline",
  start(src) {
    return src.match(/:[a-zA-Z0-9_\-\+]+:/)?.index;
  },
  tokenizer(src) {
    const match = /^:([a-zA-Z0-9_\-\+]+):/.exec(src);
    if (match && Object.hasOwn(full, match[1])) {
      return {
        type: "emoji",
        raw: match[0],
        alias: match[1],
        text: full[match[1]],
      };
    }
  },
  renderer(token) {
    const text = String(token.text);
    const codePoint = (text.codePointAt(0) ?? 0).toString(16);
    return `<g-emoji class="g-emoji" alias="${token.alias}" fallback-src="${EMOJI_CDN}/${codePoint}.png">${text}</g-emoji>`;
  },
};

/**
 * Markdown to HTML. Configured once: GitHub heading ids, highlight.js,
 * KaTeX math (`$x$`, `$$x$$`, ```math blocks), numeric footnotes and
 * `:emoji:` shortcodes. The output is not sanitized.
 */
export const parse = /* @__PURE__ */ (function initMarked() {
  marked.use({
    highlight(code, lang) {
      const language = hljs.getLanguage(lang) ? lang : "plaintext";
      return hljs.highlight(code, { language }).value;
    },
    extensions: [footnoteList, footnote, emoji, math],
    renderer,
  });
  return function parse(text: string): string {
    slugger.reset();
    return marked.parse(text);
  };
})();
