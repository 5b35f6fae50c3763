import path from "node:path"

/**
 * A location on the file system known to be a directory.
 */
export class Directory {
  constructor(readonly path: string) {}

  dir(relative: string): Directory {
    return new Directory(path.join(this.path, relative))
  }

  file(relative: string): RegularFile {
    return new RegularFile(path.join(this.path, relative))
  }

  toString(): string {
    return this.path
  }
}

/**
 * A location on the file system known to be a regular file.
 */
export class RegularFile {
  constructor(readonly path: string) {}

  get parent(): Directory {
    return new Directory(path.dirname(this.path))
  }

  toString(): string {
    return this.path
  }
}
