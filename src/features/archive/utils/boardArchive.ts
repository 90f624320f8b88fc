import JSZip from 'jszip';
import { ConfigError } from '@/lib/errors';

export interface BoardArchive {
    // Paths of the Gerber and drill files inside the zip.
    files: string[];
    read(name: string): Promise<string>;
}

const ARTWORK_FILE = /\.(gbr|ger|gtl|gbl|gts|gbs|gto|gbo|gko|gm[0-9]+|drl|xln|exc)$/i;

const baseName = (path: string): string => path.slice(path.lastIndexOf('/') + 1);

/**
 * Opens a zip of fabrication outputs. Files are found by their full path in
 * the archive or, failing that, by their base name.
 */
export const loadBoardArchive = async (data: Uint8Array | ArrayBuffer): Promise<BoardArchive> => {
    const zip = await new JSZip().loadAsync(data);
    const entries = Object.values(zip.files).filter((entry) => !entry.dir && ARTWORK_FILE.test(entry.name));

    const read = async (name: string): Promise<string> => {
        const entry = entries.find((candidate) => candidate.name === name)
            ?? entries.find((candidate) => baseName(candidate.name) === baseName(name));
        if (!entry) {
            throw new ConfigError(name, 'not found in the board archive');
        }
        return entry.async('string');
    };

    return { files: entries.map((entry) => entry.name), read };
};
