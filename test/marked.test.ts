import { describe, expect, it } from "vitest";

import { parse } from "../src/marked.js";

describe("parse", () => {
  it("renders headings with GitHub ids", () => {
    expect(parse("# Hi")).toBe('<h1 id="hi">Hi</h1>\n');
  });

  it("resets heading ids between documents", () => {
    const html = '<h1 id="hi">Hi</h1>\n<h1 id="hi-1">Hi</h1>\n';
    expect(parse("# Hi\n\n# Hi")).toBe(html);
    expect(parse("# Hi\n\n# Hi")).toBe(html);
  });

  it("highlights fenced code", () => {
    expect(parse("```js\nconst a = 1;\n```")).toContain('<span class="hljs-keyword">const</span>');
  });

  it("renders math with KaTeX", () => {
    expect(parse("Energy: $E=mc^2$")).toContain('class="katex"');
  });

  it("renders footnotes", () => {
    const html = parse("Hello[^1]\n\n[^1]: A note.");
    expect(html).toContain('<sup><a href="#fn-1" id="fnref-1">1</a></sup>');
    expect(html).toContain('<section class="footnotes">');
  });

  it("renders emoji shortcodes", () => {
    const html = parse("Hi :smile:");
    expect(html).toContain('alias="smile"');
    expect(html).toContain("\u{1F604}");
  });

  it("leaves unknown shortcodes alone", () => {
    expect(parse("a :not-an-emoji-name: b")).toBe("<p>a :not-an-emoji-name: b</p>\n");
  });
});
