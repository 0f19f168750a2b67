export function generateSlug(name: string): string {
    return name
        .toLowerCase()
        .replace(/[^a-z0-9 _-]/g, '') // Remove special chars
        .replace(/[\s_]+/g, '-')      // Spaces to hyphens
        .replace(/-+/g, '-')          // Collapse multiple hyphens
        .replace(/^-|-$/g, '')
        .substring(0, 50);            // Limit length
}

/** Make a book name safe to use as a directory name. */
export function sanitizeFilename(name: string): string {
    return name
        .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '')
        .trim()
        .replace(/\s+/g, '_')
        .substring(0, 100);
}
