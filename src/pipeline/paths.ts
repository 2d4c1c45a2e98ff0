import { basename, dirname, extname, join } from 'path';

/**
 * Path next to `path` with the extension replaced and `suffix` appended to the stem
 */
export function siblingPath(path: string, suffix: string, extension: string): string {
    const stem = basename(path, extname(path));
    return join(dirname(path), `${stem}${suffix}${extension}`);
}

export function hasExtension(path: string, extension: string): boolean {
    return extname(path).toLowerCase() === extension;
}
