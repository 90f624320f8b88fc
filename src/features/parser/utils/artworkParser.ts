import type { ArtworkSource, ParsedArtwork } from '~types/pcb';
import { parseDrill } from './drillParser';
import { parseGerber } from './gerberParser';

export const parseArtwork = (source: ArtworkSource): ParsedArtwork =>
    source.kind === 'drill' ? parseDrill(source) : parseGerber(source);
