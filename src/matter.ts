import { CORE_SCHEMA, dump, load, YAMLException } from "js-yaml";
import { z } from "zod";

import { DecodeError, MalformedInputError } from "./errors.js";
import { Metadata } from "./typings.js";

const DELIMITER = "---";

export interface Matter {
  matter: string;
  body: string;
}

/**
 * Split raw text into its front matter block and body.
 *
 * The first `---` line opens the block and the second closes it; anything
 * before the opening line is dropped. Text without any delimiter is all body.
 */
export function splitMatter(raw: string, source = "<input>"): Matter {
  // editors on Windows may start a UTF-8 file with a byte order mark
  if (raw.startsWith("\uFEFF")) raw = raw.slice(1);
  const lines = raw.split("\n");
  const matter: string[] = [];
  const body: string[] = [];
  let count = 0;

  for (const line of lines) {
    if (count < 2 && line.replace(/\r$/, "") === DELIMITER) {
      count++;
      continue;
    }
    if (count === 1) {
      matter.push(line);
    } else if (count === 2) {
      body.push(line);
    }
  }

  if (count === 0) return { matter: "", body: raw };
  if (count === 1) {
    throw new MalformedInputError(`Unterminated front matter in ${source}`);
  }
  return { matter: matter.join("\n"), body: body.join("\n") };
}

const scalar = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value == null ? "" : String(value)));

const schema = z.object({
  title: scalar,
  date: scalar,
  tags: z
    .array(z.union([z.string(), z.number(), z.boolean()]).transform(String))
    .nullish()
    .transform((tags) => tags ?? []),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Load a front matter block as a plain mapping, keeping every key. */
export function loadMatter(matter: string, source = "<input>"): Record<string, unknown> {
  let doc: unknown;
  try {
    doc = load(matter, { schema: CORE_SCHEMA, filename: source });
  } catch (err) {
    if (err instanceof YAMLException) {
      throw new DecodeError(`Invalid front matter in ${source}: ${err.reason}`, { cause: err });
    }
    throw err;
  }
  // an empty block loads as undefined
  if (doc == null) return {};
  if (!isRecord(doc)) {
    throw new DecodeError(`Invalid front matter in ${source}: expected a mapping`);
  }
  return doc;
}

export function decodeMetadata(matter: string, source = "<input>"): Metadata {
  const result = schema.safeParse(loadMatter(matter, source));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new DecodeError(`Invalid front matter in ${source}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/** Inverse of {@link splitMatter} for a mapping and a body. */
export function stringifyMatter(data: Record<string, unknown>, body: string): string {
  const yaml = dump(data, { schema: CORE_SCHEMA, flowLevel: 1, lineWidth: -1 });
  return `${DELIMITER}\n${yaml}${DELIMITER}\n${body}`;
}
