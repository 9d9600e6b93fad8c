/**
 * Display form of an extension list: ['pdf', 'txt'] → ".pdf, .txt".
 */
export function extensionList(extensions: readonly string[]): string {
    return extensions.map(ext => `.${ext}`).join(', ');
}
