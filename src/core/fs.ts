import { appendFile, mkdir, readdir, readFile, realpath, rename, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { isNotFoundError } from './errors.js'

export type EntryKind = 'file' | 'directory'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON(path: string): Promise<unknown>
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    appendText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    kind(path: string): Promise<EntryKind | null>
    listDir(path: string): Promise<string[]>
    mkdir(path: string): Promise<void>
    rename(from: string, to: string): Promise<void>
    remove(path: string): Promise<void>
    /** Follows symlinks in the deepest existing ancestor; the missing tail is re-joined as written. */
    realpath(path: string): Promise<string>
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async readJSON(filePath: string): Promise<unknown> {
        return JSON.parse(await this.readText(filePath))
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await writeFile(filePath, content, 'utf8')
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8')
    }

    async appendText(filePath: string, content: string): Promise<void> {
        await appendFile(filePath, content, 'utf8')
    }

    async exists(filePath: string): Promise<boolean> {
        return (await this.kind(filePath)) !== null
    }

    async kind(filePath: string): Promise<EntryKind | null> {
        try {
            const info = await stat(filePath)
            return info.isDirectory() ? 'directory' : 'file'
        } catch (error) {
            if (isNotFoundError(error)) return null
            throw error
        }
    }

    async listDir(dirPath: string): Promise<string[]> {
        const entries = await readdir(dirPath)
        return entries.sort()
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }

    async rename(from: string, to: string): Promise<void> {
        await rename(from, to)
    }

    async remove(filePath: string): Promise<void> {
        await rm(filePath, { recursive: true, force: true })
    }

    async realpath(filePath: string): Promise<string> {
        const tail: string[] = []
        let current = path.resolve(filePath)
        for (;;) {
            try {
                return path.join(await realpath(current), ...tail)
            } catch (error) {
                if (!isNotFoundError(error) || current === path.dirname(current)) throw error
                tail.unshift(path.basename(current))
                current = path.dirname(current)
            }
        }
    }
}

function enoent(filePath: string): Error {
    return Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), { code: 'ENOENT' })
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private dirs = new Set<string>()
    private links = new Map<string, string>()

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw enoent(filePath)
        return content
    }

    async readJSON(filePath: string): Promise<unknown> {
        return JSON.parse(await this.readText(filePath))
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, content)
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        this.files.set(filePath, JSON.stringify(data, null, 2))
    }

    async appendText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, (this.files.get(filePath) ?? '') + content)
    }

    async exists(filePath: string): Promise<boolean> {
        return (await this.kind(filePath)) !== null
    }

    async kind(filePath: string): Promise<EntryKind | null> {
        if (this.files.has(filePath)) return 'file'
        if (this.dirs.has(filePath)) return 'directory'
        const prefix = `${filePath}/`
        for (const key of this.files.keys()) {
            if (key.startsWith(prefix)) return 'directory'
        }
        return null
    }

    async listDir(dirPath: string): Promise<string[]> {
        const prefix = `${dirPath}/`
        const names = new Set<string>()
        for (const key of [...this.files.keys(), ...this.dirs]) {
            if (!key.startsWith(prefix)) continue
            const head = key.slice(prefix.length).split('/')[0]
            if (head) names.add(head)
        }
        if (names.size === 0 && !this.dirs.has(dirPath)) throw enoent(dirPath)
        return [...names].sort()
    }

    async mkdir(dirPath: string): Promise<void> {
        let current = dirPath
        while (current !== path.dirname(current)) {
            this.dirs.add(current)
            current = path.dirname(current)
        }
    }

    async rename(from: string, to: string): Promise<void> {
        const content = this.files.get(from)
        if (content === undefined) throw enoent(from)
        this.files.delete(from)
        this.files.set(to, content)
    }

    async remove(filePath: string): Promise<void> {
        this.files.delete(filePath)
        this.dirs.delete(filePath)
        const prefix = `${filePath}/`
        for (const key of [...this.files.keys()]) {
            if (key.startsWith(prefix)) this.files.delete(key)
        }
    }

    async realpath(filePath: string): Promise<string> {
        let resolved = path.resolve(filePath)
        for (let hops = 0; hops < 32; hops++) {
            const link = [...this.links.keys()].find((from) => resolved === from || resolved.startsWith(`${from}/`))
            if (link === undefined) return resolved
            resolved = path.join(this.links.get(link) ?? link, resolved.slice(link.length))
        }
        throw Object.assign(new Error(`ELOOP: too many symbolic links, realpath '${filePath}'`), { code: 'ELOOP' })
    }

    /** Makes `linkPath` resolve to `target` in `realpath`; reads through the link are not followed. */
    setLink(linkPath: string, target: string): void {
        this.links.set(path.resolve(linkPath), path.resolve(target))
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }
}
