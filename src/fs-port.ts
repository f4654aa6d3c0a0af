import path from 'node:path'
import { readdir, realpath, stat } from 'node:fs/promises'
import { getErrorCode } from './errors'

export interface DirectoryEntry {
  name: string
  // Follows symbolic links; a dangling link counts as a file
  isDirectory: boolean
}
export interface PathStat {
  isDirectory: boolean
}
export interface FileSystemPort {
  readDirectory(dirPath: string): Promise<DirectoryEntry[]>
  realPath(targetPath: string): Promise<string>
  /**
   * Resolves `undefined` when nothing exists at `targetPath`.
   */
  statPath(targetPath: string): Promise<PathStat | undefined>
}

const danglingCodes = new Set(['ENOENT', 'ENOTDIR', 'ELOOP'])

async function isDirectoryLink(linkPath: string) {
  try {
    return (await stat(linkPath)).isDirectory()
  } catch (err) {
    if (danglingCodes.has(getErrorCode(err) ?? '')) {
      return false
    }
    throw err
  }
}

export const nodeFileSystem: FileSystemPort = {
  async readDirectory(dirPath) {
    const dirents = await readdir(dirPath, { withFileTypes: true })
    return Promise.all(
      dirents.map(async (dirent) => ({
        name: dirent.name,
        isDirectory: dirent.isSymbolicLink()
          ? await isDirectoryLink(path.join(dirPath, dirent.name))
          : dirent.isDirectory(),
      }))
    )
  },
  realPath(targetPath) {
    return realpath(targetPath)
  },
  async statPath(targetPath) {
    try {
      const stats = await stat(targetPath)
      return { isDirectory: stats.isDirectory() }
    } catch (err) {
      if (danglingCodes.has(getErrorCode(err) ?? '')) {
        return undefined
      }
      throw err
    }
  },
}
