export class TagpressError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Reading or writing a file or directory failed. */
export class IOError extends TagpressError {
  declare path: string;
  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`${message}: ${path}`, options);
    this.path = path;
  }
}

/** The front matter is not a valid metadata document. */
export class DecodeError extends TagpressError {}

/** The front matter block was opened but never closed. */
export class MalformedInputError extends TagpressError {}

/** A template could not be found, compiled or executed. */
export class TemplateError extends TagpressError {
  declare template: string;
  constructor(template: string, message: string, options?: ErrorOptions) {
    super(`${message} (template: ${template})`, options);
    this.template = template;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
