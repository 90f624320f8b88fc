import type { Machine, ProcessConfig } from '~types/machine';
import type { ArtworkKind, ArtworkSource, ForgeProject, OutputFileSpec, Stage } from '~types/pcb';
import { ConfigError, ForgeError } from '@/lib/errors';
import type { ForgeFile, GlobalConfig, MachineConfig, StageConfig } from './configSchema';

/**
 * Returns the text of an artwork file named in the forge file.
 */
export type ArtworkReader = (path: string) => Promise<string>;

export const toMachine = (name: string, config: MachineConfig): Machine => ({
    name,
    units: config.units,
    jogSpeed: config.jog_speed,
    tools: config.tools,
    engravingConfigs: config.engraving_configs,
    cuttingConfigs: config.cutting_configs,
    workspaceArea: config.workspace_area,
    initGcode: config.init_gcode,
    shutdownGcode: config.shutdown_gcode,
});

/**
 * Project machines shadow global ones of the same name.
 */
export const mergeMachines = (global: GlobalConfig, forge: ForgeFile): Map<string, Machine> => {
    const machines = new Map<string, Machine>();
    for (const [name, config] of Object.entries(global.machines)) {
        machines.set(name, toMachine(name, config));
    }
    for (const [name, config] of Object.entries(forge.machines)) {
        machines.set(name, toMachine(name, config));
    }
    return machines;
};

interface StageParts {
    operation: Stage['operation'];
    machineConfig?: string;
    artwork: { path: string; kind: ArtworkKind };
    backside: boolean;
    invert?: boolean;
    selectLines?: Stage['selectLines'];
}

const stageParts = (config: StageConfig, path: string): StageParts => {
    if ('engrave_mask' in config) {
        const stage = config.engrave_mask;
        return {
            operation: 'engrave_mask',
            machineConfig: stage.machine_config,
            artwork: { path: stage.gerber_file, kind: 'gerber' },
            backside: stage.backside,
            invert: stage.invert,
            selectLines: stage.select_lines,
        };
    }
    const stage = config.cut_board;
    const artwork = stage.gerber_file !== undefined
        ? { path: stage.gerber_file, kind: 'gerber' as const }
        : stage.drill_file !== undefined
            ? { path: stage.drill_file, kind: 'drill' as const }
            : null;
    if (!artwork) {
        throw new ConfigError(path, 'cut_board needs a gerber_file or a drill_file');
    }
    return {
        operation: 'cut_board',
        machineConfig: stage.machine_config,
        artwork,
        backside: stage.backside,
        selectLines: stage.select_lines,
    };
};

const resolveProcess = (
    machines: Map<string, Machine>,
    reference: string,
    operation: Stage['operation'],
    path: string
): { machine: Machine; process: ProcessConfig } => {
    const parts = reference.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
        throw new ConfigError(path, `machine config '${reference}' must look like '<machine>/<config>'`);
    }
    const [machineName, configName] = parts;
    const machine = machines.get(machineName);
    if (!machine) {
        throw new ConfigError(path, `unknown machine '${machineName}'`);
    }

    if (operation === 'engrave_mask') {
        const config = machine.engravingConfigs[configName];
        if (!config) throw new ConfigError(path, `machine '${machineName}' has no engraving config '${configName}'`);
        return { machine, process: { kind: 'engrave', ...config } };
    }
    const config = machine.cuttingConfigs[configName];
    if (!config) throw new ConfigError(path, `machine '${machineName}' has no cutting config '${configName}'`);
    return { machine, process: { kind: 'cut', ...config } };
};

/**
 * Turns the global config and a forge file into a project the pipeline can
 * run, reading each artwork file once.
 */
export const resolveProject = async (
    global: GlobalConfig,
    forge: ForgeFile,
    readArtwork: ArtworkReader
): Promise<ForgeProject> => {
    const machines = mergeMachines(global, forge);
    const texts = new Map<string, Promise<string>>();

    const load = async (artwork: StageParts['artwork'], path: string): Promise<ArtworkSource> => {
        let pending = texts.get(artwork.path);
        if (!pending) {
            pending = readArtwork(artwork.path);
            texts.set(artwork.path, pending);
        }
        try {
            return { name: artwork.path, kind: artwork.kind, text: await pending };
        } catch (err) {
            if (err instanceof ForgeError) throw err;
            throw new ConfigError(path, `cannot read '${artwork.path}': ${err instanceof Error ? err.message : String(err)}`);
        }
    };

    const files: OutputFileSpec[] = [];
    for (const [fileName, stageConfigs] of Object.entries(forge.gcode_files)) {
        const stages: Stage[] = [];
        for (const [index, stageConfig] of stageConfigs.entries()) {
            const path = `gcode_files.${fileName}.${index}`;
            const parts = stageParts(stageConfig, path);
            const reference = parts.machineConfig
                ?? (parts.operation === 'engrave_mask' ? global.default_engraver : global.default_cutter);
            if (!reference) {
                throw new ConfigError(
                    path,
                    `no machine_config given and no ${parts.operation === 'engrave_mask' ? 'default_engraver' : 'default_cutter'} configured`
                );
            }
            const { machine, process } = resolveProcess(machines, reference, parts.operation, path);
            stages.push({
                name: `${fileName} #${index + 1} ${parts.operation}`,
                operation: parts.operation,
                artwork: [await load(parts.artwork, path)],
                machine,
                process,
                backside: parts.backside,
                selectLines: parts.selectLines,
                invert: parts.invert,
            });
        }
        files.push({ name: fileName, stages });
    }

    return { name: forge.project_name, alignBackside: forge.align_backside, files };
};
