import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { OutputFileResult } from '~types/pcb';
import { ConfigError, toError } from '@/lib/errors';
import { type Logger, consoleLogger } from '@/lib/logger';
import { type GlobalConfig, parseForgeFile, parseGlobalConfig } from '@/features/config/utils/configSchema';
import { type ArtworkReader, resolveProject } from '@/features/config/utils/resolveProject';
import { loadBoardArchive } from '@/features/archive/utils/boardArchive';
import { prepareProject, runProject } from '@/features/pipeline/utils/stagePipeline';
import { renderPolygonsSvg } from '@/features/debug/utils/svgRender';

export interface BuildIo {
    readText(path: string): Promise<string>;
    readBytes(path: string): Promise<Uint8Array>;
    // Must leave either the old file or the complete new one.
    writeAtomic(path: string, text: string): Promise<void>;
}

export interface BuildOptions {
    forgeFile: string;
    outDir: string;
    configPath?: string;
    // A missing config at configPath falls back to an empty one.
    configOptional?: boolean;
    archivePath?: string;
    // Also write an SVG of every artwork file's polygons under <outDir>/debug.
    debugSvg?: boolean;
    logger?: Logger;
}

export interface BuildSummary {
    project: string;
    written: string[];
    failed: { name: string; error: Error }[];
    results: OutputFileResult[];
}

export const nodeBuildIo: BuildIo = {
    readText: (path) => readFile(path, 'utf8'),
    readBytes: async (path) => new Uint8Array(await readFile(path)),
    writeAtomic: async (path, text) => {
        await mkdir(dirname(path), { recursive: true });
        const temporary = `${path}.${process.pid}.tmp`;
        try {
            await writeFile(temporary, text, 'utf8');
            await rename(temporary, path);
        } finally {
            // Already gone after a successful rename.
            await rm(temporary, { force: true });
        }
    },
};

const readYaml = async (io: BuildIo, path: string): Promise<unknown> => {
    const text = await io.readText(path);
    try {
        return parseYaml(text);
    } catch (err) {
        throw new ConfigError(path, `invalid YAML: ${toError(err).message}`);
    }
};

const loadGlobalConfig = async (io: BuildIo, options: BuildOptions, logger: Logger): Promise<GlobalConfig> => {
    if (!options.configPath) return parseGlobalConfig({});
    let input: unknown;
    try {
        input = await readYaml(io, options.configPath);
    } catch (err) {
        if (!options.configOptional || err instanceof ConfigError) throw err;
        logger.warn(`[forge] No config at ${options.configPath}, continuing without global machines`);
        return parseGlobalConfig({});
    }
    // An empty file holds no machines.
    return parseGlobalConfig(input ?? {});
};

/**
 * Reads the forge file and everything it names, runs the pipeline and
 * writes each output that succeeded. A file that cannot be written is
 * reported with the failed ones; the others are still written.
 */
export const buildProject = async (options: BuildOptions, io: BuildIo = nodeBuildIo): Promise<BuildSummary> => {
    const logger = options.logger ?? consoleLogger;
    logger.info(`[forge] Reading forge file ${options.forgeFile}`);

    const global = await loadGlobalConfig(io, options, logger);
    const forge = parseForgeFile(await readYaml(io, options.forgeFile));

    let readArtwork: ArtworkReader;
    if (options.archivePath) {
        const archive = await loadBoardArchive(await io.readBytes(options.archivePath));
        logger.info(`[forge] Archive ${options.archivePath}: ${archive.files.length} artwork file(s)`);
        readArtwork = archive.read;
    } else {
        const base = dirname(options.forgeFile);
        readArtwork = (path) => io.readText(resolve(base, path));
    }

    const project = await resolveProject(global, forge, readArtwork);
    const results = await runProject(project, { logger });

    const written: string[] = [];
    const failed: BuildSummary['failed'] = [];
    const write = async (name: string, target: string, text: string): Promise<void> => {
        try {
            await io.writeAtomic(target, text);
        } catch (err) {
            const error = toError(err);
            logger.error(`[forge] Cannot write ${target}: ${error.message}`);
            failed.push({ name, error });
            return;
        }
        written.push(target);
        logger.info(`[forge] Wrote ${target}`);
    };

    for (const result of results) {
        if (!result.ok) {
            failed.push({ name: result.name, error: result.error });
            continue;
        }
        await write(result.name, join(options.outDir, result.name), result.gcode);
    }

    if (options.debugSvg) {
        for (const [name, artwork] of prepareProject(project)) {
            if (!artwork.ok) continue;
            const svgName = `${basename(name)}.svg`;
            await write(svgName, join(options.outDir, 'debug', svgName), renderPolygonsSvg(artwork.polygons, { outline: true }));
        }
    }

    return { project: project.name, written, failed, results };
};
