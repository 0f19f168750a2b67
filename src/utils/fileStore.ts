import * as fs from 'fs/promises';
import * as path from 'path';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (isMissingFileError(error)) return null;
        throw error;
    }
}

export function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function listFiles(dir: string): Promise<string[]> {
    try {
        return await fs.readdir(dir);
    } catch (error) {
        if (isMissingFileError(error)) return [];
        throw error;
    }
}

/**
 * Write through a temporary sibling and rename it into place, so readers never
 * see a half-written file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.tmp-${process.pid}`;
    try {
        await fs.writeFile(tmpPath, content, 'utf-8');
        await fs.rename(tmpPath, filePath);
    } catch (error) {
        await fs.rm(tmpPath, { force: true });
        throw error;
    }
}

/** Version numbers present for `<stem>_v<N><ext>` in a directory, ascending. */
export async function listVersions(dir: string, stem: string, ext: string): Promise<number[]> {
    const pattern = new RegExp(`^${escapeRegExp(stem)}_v(\\d+)${escapeRegExp(ext)}$`);
    const versions: number[] = [];
    for (const name of await listFiles(dir)) {
        const match = pattern.exec(name);
        if (match) versions.push(parseInt(match[1], 10));
    }
    return versions.sort((a, b) => a - b);
}

export function versionedName(stem: string, version: number, ext: string): string {
    return `${stem}_v${version}${ext}`;
}

export async function latestVersionPath(dir: string, stem: string, ext: string): Promise<string | null> {
    const versions = await listVersions(dir, stem, ext);
    if (versions.length === 0) return null;
    return path.join(dir, versionedName(stem, versions[versions.length - 1], ext));
}

export async function nextVersionPath(dir: string, stem: string, ext: string): Promise<string> {
    const versions = await listVersions(dir, stem, ext);
    const next = versions.length > 0 ? versions[versions.length - 1] + 1 : 1;
    return path.join(dir, versionedName(stem, next, ext));
}

/** Write content as the next version; earlier versions stay on disk. */
export async function writeVersioned(dir: string, stem: string, ext: string, content: string): Promise<string> {
    const target = await nextVersionPath(dir, stem, ext);
    await writeFileAtomic(target, content);
    return target;
}
