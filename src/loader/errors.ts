/** Header row present but none of the accepted id column names found. Per file. */
export class MissingIdColumnError extends Error {
  readonly dataPath: string;
  readonly headers: readonly string[];

  constructor(dataPath: string, headers: readonly string[], accepted: readonly string[]) {
    super(
      `No id column in header of ${dataPath} (expected one of: ${accepted.join(", ")}; found: ${headers.join(", ") || "(empty)"})`,
    );
    this.name = "MissingIdColumnError";
    this.dataPath = dataPath;
    this.headers = headers;
  }
}

/** Data file header could not be read (gone, unreadable, a directory). Per file. */
export class HeaderReadError extends Error {
  readonly dataPath: string;
  readonly code: string | undefined;

  constructor(dataPath: string, cause: NodeJS.ErrnoException) {
    super(`Cannot read header of ${dataPath}: ${cause.code ?? cause.message}`);
    this.name = "HeaderReadError";
    this.dataPath = dataPath;
    this.code = cause.code;
  }
}

/** Insert template could not be turned into a delete template. Per file. */
export class TemplateSynthesisError extends Error {
  readonly templatePath: string;

  constructor(templatePath: string, message: string) {
    super(`Cannot build delete template from ${templatePath}: ${message}`);
    this.name = "TemplateSynthesisError";
    this.templatePath = templatePath;
  }
}

/** The loader executable (or wine) could not be started at all. Fatal to the run. */
export class LoaderLaunchError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: NodeJS.ErrnoException) {
    super(`Failed to launch loader (${command}): ${cause.message}`);
    this.name = "LoaderLaunchError";
    this.command = command;
    this.code = cause.code;
  }
}

/** Nothing to process in the source directory. */
export class EmptyBatchError extends Error {
  readonly sourceDir: string;

  constructor(sourceDir: string, pattern: string) {
    super(`No ${pattern} files found in ${sourceDir}`);
    this.name = "EmptyBatchError";
    this.sourceDir = sourceDir;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
