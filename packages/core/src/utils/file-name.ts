/**
 * Filename helpers shared by the engine and port implementations.
 */

export interface FileNameParts {
    baseName: string;
    /** Lowercased, without the dot; empty when the name has none. */
    extension: string;
}

/**
 * Split a filename at its last dot. A leading dot (".env") is not an
 * extension separator.
 */
export function splitFileName(fileName: string): FileNameParts {
    const dot = fileName.lastIndexOf('.');
    if (dot <= 0) {
        return { baseName: fileName, extension: '' };
    }
    return {
        baseName: fileName.slice(0, dot),
        extension: fileName.slice(dot + 1).toLowerCase(),
    };
}

/**
 * Hidden and temporary entries (".DS_Store", "~$report.pdf") are never
 * considered documents.
 */
export function isHiddenName(name: string): boolean {
    return name.startsWith('.') || name.startsWith('~');
}
