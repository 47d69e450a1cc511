import { errnoCode } from "../utils/errorUtils.js";

export type PathValidationCode =
  | "path_not_set"
  | "unsupported_network_path"
  | "not_a_directory"
  | "filesystem_error";

/** Raised while validating the download or library path. Only these abort a reload. */
export class PathValidationError extends Error {
  readonly code: PathValidationCode;
  readonly path: string;

  constructor(code: PathValidationCode, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PathValidationError";
    this.code = code;
    this.path = path;
  }
}

export class PathNotSetError extends PathValidationError {
  constructor(path: string) {
    super("path_not_set", path, "Path not set");
    this.name = "PathNotSetError";
  }
}

export class UnsupportedNetworkPathError extends PathValidationError {
  constructor(path: string) {
    super(
      "unsupported_network_path",
      path,
      `Network paths are not supported, change ${path} to a locally mounted path by the OS`,
    );
    this.name = "UnsupportedNetworkPathError";
  }
}

export class NotADirectoryError extends PathValidationError {
  constructor(path: string) {
    super("not_a_directory", path, `${path} is not a valid directory`);
    this.name = "NotADirectoryError";
  }
}

export class FilesystemError extends PathValidationError {
  /** OS error code of the cause, such as `EACCES`. */
  readonly errno: string | undefined;

  constructor(path: string, cause: Error) {
    super("filesystem_error", path, cause.message, { cause });
    this.name = "FilesystemError";
    this.errno = errnoCode(cause);
  }
}

export class ConfigurationNotLoadedError extends Error {
  constructor() {
    super("configuration has not been loaded yet");
    this.name = "ConfigurationNotLoadedError";
  }
}

export class DaemonOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid daemon options: ${issues.join("; ")}`);
    this.name = "DaemonOptionsError";
    this.issues = issues;
  }
}
