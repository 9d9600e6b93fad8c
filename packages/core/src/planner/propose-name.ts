import type { DestinationProfile, EnginePorts, SourceDocument } from '../types/index.js';
import { resolveDocumentDate, type DateResolveOptions } from '../dates/index.js';
import { generateFilename, inferNamingPattern } from '../naming/index.js';
import type { NameReservations } from './reservations.js';

/**
 * Propose a filename for `source` inside `destination`: the document's date
 * rendered through the folder's current naming pattern, disambiguated against
 * existing and already-reserved names. The chosen name is reserved.
 */
export async function proposeName(
    source: SourceDocument,
    destination: DestinationProfile,
    ports: EnginePorts,
    reservations: NameReservations,
    options: DateResolveOptions
): Promise<string> {
    const { date } = await resolveDocumentDate(source.path, ports, options);
    const folder = await reservations.forFolder(destination.path);
    const pattern = inferNamingPattern(destination.folderName, folder.entryNames, source.extension);

    const name = generateFilename(pattern, date, source.extension, candidate => folder.isTaken(candidate));
    folder.reserve(name);
    return name;
}
