/**
 * Content-addressed image storage for room illustrations.
 */
import { access, mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

export interface IImageStore {
    /** Path of a stored image, or null when it has not been stored yet. */
    find(fileName: string): Promise<string | null>
    /** Store bytes under `fileName` (overwriting) and return the path. */
    save(fileName: string, bytes: Uint8Array): Promise<string>
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Images as files in one directory, created on first save.
 */
export class FileImageStore implements IImageStore {
    constructor(readonly directory: string) {}

    async find(fileName: string): Promise<string | null> {
        const path = join(this.directory, fileName)
        try {
            await access(path)
            return path
        } catch (error) {
            if (isNotFound(error)) return null
            throw error
        }
    }

    async save(fileName: string, bytes: Uint8Array): Promise<string> {
        await mkdir(this.directory, { recursive: true })
        const path = join(this.directory, fileName)
        await writeFile(path, bytes)
        return path
    }
}
