import { describe, test, expect, vi } from 'vitest';
import { parseForgeFile, parseGlobalConfig } from '@/features/config/utils/configSchema';
import { resolveProject } from '@/features/config/utils/resolveProject';
import { ConfigError } from '@/lib/errors';

const mill = (jogSpeed?: string) => ({
    ...(jogSpeed ? { jog_speed: jogSpeed } : {}),
    workspace_area: { width: '200mm', height: '150mm' },
    tools: {
        spindle: { spindle: { max_speed: '20000rpm', bits: { em05: { end_mill: { diameter: '0.5mm' } } } } },
        laser: { laser: { point_diameter: '0.1mm', max_power: '5W' } },
    },
    cutting_configs: {
        board: {
            tool: 'spindle/em05',
            work_speed: '300 mm/min',
            travel_height: '2mm',
            cut_depth: '-1.6mm',
            pass_depth: '0.4mm',
            plunge_speed: '1 mm/s',
            spindle_speed: '12000rpm',
        },
    },
    engraving_configs: {
        mask: { tool: 'laser', work_speed: '20 mm/s', laser_power: '2W' },
    },
});

const forgeFile = (gcodeFiles: unknown, machines: unknown = { mill: mill() }) => ({
    project_name: 'blinky',
    machines,
    gcode_files: gcodeFiles,
});

describe('config schema', () => {
    test('converts quantities and fills defaults', () => {
        const forge = parseForgeFile(forgeFile({ 'edge.nc': [{ cut_board: { machine_config: 'mill/board', gerber_file: 'edge.gbr' } }] }));
        const machine = forge.machines.mill;
        expect(machine.units).toBe('metric');
        expect(machine.jog_speed).toEqual({ magnitude: 50, unit: 'mm/s' });
        expect(machine.tools.spindle).toEqual({
            kind: 'spindle',
            maxSpeed: { magnitude: 20000, unit: 'rpm' },
            bits: { em05: { kind: 'end_mill', diameter: { magnitude: 0.5, unit: 'mm' } } },
            initGcode: undefined,
        });
        expect(machine.cutting_configs.board.power).toEqual({ kind: 'spindle', spindleSpeed: { magnitude: 12000, unit: 'rpm' } });
        expect(machine.engraving_configs.mask).toMatchObject({ passes: 1, fill: false, power: { kind: 'laser' } });
        expect(forge.align_backside).toBe(true);
        expect(forge.gcode_files['edge.nc'][0]).toEqual({
            cut_board: { machine_config: 'mill/board', gerber_file: 'edge.gbr', backside: false },
        });
    });

    test('keeps init and shutdown code verbatim', () => {
        const machine = {
            ...mill(),
            init_gcode: 'G28\n',
            shutdown_gcode: 'M84',
            tools: { laser: { laser: { point_diameter: '0.1mm', max_power: '5W', shutdown_gcode: 'M9' } } },
            cutting_configs: {},
        };
        const forge = parseForgeFile(forgeFile({}, { mill: machine }));
        expect(forge.machines.mill.init_gcode).toBe('G28\n');
        expect(forge.machines.mill.shutdown_gcode).toBe('M84');
        expect(forge.machines.mill.tools.laser).toMatchObject({ kind: 'laser', shutdownGcode: 'M9' });
    });

    test('names the field of a bad quantity', () => {
        expect(() => parseForgeFile(forgeFile({}, { mill: mill('fast') }))).toThrow(
            "forge file: machines.mill.jog_speed: 'fast' is not a speed with a unit"
        );
    });

    test('needs exactly one artwork file for a cut', () => {
        const both = forgeFile({ 'x.nc': [{ cut_board: { gerber_file: 'a.gbr', drill_file: 'a.drl' } }] });
        expect(() => parseForgeFile(both)).toThrow(ConfigError);
        expect(() => parseForgeFile(both)).toThrow('set exactly one of gerber_file or drill_file');
    });

    test('needs exactly one power setting per process', () => {
        const machine = { ...mill(), engraving_configs: { mask: { tool: 'laser', work_speed: '20 mm/s' } } };
        expect(() => parseForgeFile(forgeFile({}, { mill: machine }))).toThrow('set exactly one of laser_power or spindle_speed');
    });

    test('rejects unknown keys', () => {
        expect(() => parseGlobalConfig({ machines: {}, default_laser: 'x' })).toThrow(ConfigError);
    });
});

describe('resolveProject', () => {
    const global = parseGlobalConfig({ machines: { mill: mill() }, default_cutter: 'mill/board', default_engraver: 'mill/mask' });

    test('builds stages with default machine configs and reads each file once', async () => {
        const forge = parseForgeFile(forgeFile(
            {
                'edge.nc': [{ cut_board: { gerber_file: 'edge.gbr' } }, { cut_board: { gerber_file: 'edge.gbr', select_lines: 'outer' } }],
                'mask.nc': [{ engrave_mask: { gerber_file: 'mask.gbr', backside: true, invert: true } }],
            },
            {}
        ));
        const read = vi.fn(async (path: string) => `contents of ${path}`);
        const project = await resolveProject(global, forge, read);

        expect(project.name).toBe('blinky');
        expect(project.files.map((file) => [file.name, file.stages.map((stage) => stage.name)])).toEqual([
            ['edge.nc', ['edge.nc #1 cut_board', 'edge.nc #2 cut_board']],
            ['mask.nc', ['mask.nc #1 engrave_mask']],
        ]);
        const [, second] = project.files[0].stages;
        expect(second.selectLines).toBe('outer');
        expect(second.process.kind).toBe('cut');
        expect(second.artwork).toEqual([{ name: 'edge.gbr', kind: 'gerber', text: 'contents of edge.gbr' }]);
        const [mask] = project.files[1].stages;
        expect(mask).toMatchObject({ backside: true, invert: true, process: { kind: 'engrave', tool: 'laser' } });
        expect(read).toHaveBeenCalledTimes(2);
    });

    test('lets project machines shadow global ones', async () => {
        const forge = parseForgeFile(forgeFile({ 'edge.nc': [{ cut_board: { drill_file: 'holes.drl' } }] }, { mill: mill('20 mm/s') }));
        const project = await resolveProject(global, forge, async () => '');
        const [stage] = project.files[0].stages;
        expect(stage.machine.jogSpeed).toEqual({ magnitude: 20, unit: 'mm/s' });
        expect(stage.artwork[0].kind).toBe('drill');
    });

    test('reports unknown machines and configs', async () => {
        const unknownMachine = parseForgeFile(forgeFile({ 'a.nc': [{ cut_board: { machine_config: 'router/board', gerber_file: 'a.gbr' } }] }));
        await expect(resolveProject(global, unknownMachine, async () => '')).rejects.toThrow(
            "gcode_files.a.nc.0: unknown machine 'router'"
        );
        const unknownConfig = parseForgeFile(forgeFile({ 'a.nc': [{ cut_board: { machine_config: 'mill/vcut', gerber_file: 'a.gbr' } }] }));
        await expect(resolveProject(global, unknownConfig, async () => '')).rejects.toThrow(
            "machine 'mill' has no cutting config 'vcut'"
        );
    });

    test('needs a default when no machine config is given', async () => {
        const forge = parseForgeFile(forgeFile({ 'a.nc': [{ engrave_mask: { gerber_file: 'a.gbr' } }] }));
        await expect(resolveProject(parseGlobalConfig({}), forge, async () => '')).rejects.toThrow(
            'no machine_config given and no default_engraver configured'
        );
    });

    test('wraps read failures as config errors', async () => {
        const forge = parseForgeFile(forgeFile({ 'a.nc': [{ cut_board: { gerber_file: 'missing.gbr' } }] }));
        const read = async (): Promise<string> => {
            throw new Error('ENOENT');
        };
        await expect(resolveProject(global, forge, read)).rejects.toThrow("gcode_files.a.nc.0: cannot read 'missing.gbr': ENOENT");
        await expect(resolveProject(global, forge, read)).rejects.toBeInstanceOf(ConfigError);
    });
});
