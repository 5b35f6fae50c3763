import type { TypeToken } from "../../ports/types"
import { Types } from "../types/types"
import { AbstractProperty } from "./abstract-property"
import { Directory, RegularFile } from "./file-system"

export class DirectoryProperty extends AbstractProperty<Directory> {
  readonly type: TypeToken<Directory> = Types.Directory

  constructor() {
    super()
  }

  /** Set the value from a path. */
  fileValue(path: string): this {
    return this.set(new Directory(path))
  }

  protected accepts(value: unknown): value is Directory {
    return value instanceof Directory
  }

  protected describeType(): string {
    return this.type.name
  }
}

export class RegularFileProperty extends AbstractProperty<RegularFile> {
  readonly type: TypeToken<RegularFile> = Types.RegularFile

  constructor() {
    super()
  }

  /** Set the value from a path. */
  fileValue(path: string): this {
    return this.set(new RegularFile(path))
  }

  protected accepts(value: unknown): value is RegularFile {
    return value instanceof RegularFile
  }

  protected describeType(): string {
    return this.type.name
  }
}
