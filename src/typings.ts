export interface Metadata {
  title: string; // "" when absent
  date: string; // YYYY-MM-DD by convention, never parsed
  tags: string[];
}

export interface Post {
  readonly slug: string; // content/posts/{slug}.md
  readonly title: string;
  readonly date: string;
  readonly tags: readonly string[];
  readonly text: string; // raw markdown
  readonly content: string; // rendered html
  readonly baseUrl: string;
}

export interface Site {
  baseUrl: string;
  title: string;
}

export interface SiteConfig extends Site {
  /** default: {root}/content/posts */
  contentDir: string;
  /** default: {root}/templates */
  templatesDir: string;
  /** default: {root}/output */
  outDir: string;
}

/** A rendered page, written to `{outDir}/{id}.html`. */
export interface OutputDocument {
  id: string;
  html: string;
}
