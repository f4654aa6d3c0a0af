export enum ExitCode {
  Success = 0,
  Unexpected = 1,
  InvalidRoot = 2,
  JsonWriteFailed = 3,
  ImageRenderFailed = 4,
  OutputsFailed = 5,
}

export class TreescapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class PathNotFoundError extends TreescapeError {
  constructor(readonly path: string) {
    super(`The directory '${path}' does not exist.`)
  }
}

export class NotADirectoryError extends TreescapeError {
  constructor(readonly path: string) {
    super(`'${path}' is not a directory.`)
  }
}

export class InvalidOptionError extends TreescapeError {
  constructor(readonly option: string, readonly value: unknown) {
    super(`Invalid value for \`--${option}\`: ${String(value)}`)
  }
}

export class DirectoryPermissionError extends TreescapeError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Access denied while listing '${path}'.`, { cause })
  }
}

export class IOWriteError extends TreescapeError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to write '${path}'.`, { cause })
  }
}

export class RenderError extends TreescapeError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to render the tree image to '${path}'.`, { cause })
  }
}

// `cause` is usually a Node system error carrying a `code`
export function getErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

export function describeCause(err: TreescapeError) {
  const { cause } = err
  if (cause instanceof Error) {
    return `${err.message} (${cause.message})`
  }
  return err.message
}
