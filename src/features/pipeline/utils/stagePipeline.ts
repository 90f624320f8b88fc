import type { Bounds, Polygon } from '~types/geometry';
import type { Instruction } from '~types/motion';
import type { ArtworkSource, ForgeProject, OutputFileResult, OutputFileSpec, ParsedArtwork, Stage, StageReport } from '~types/pcb';
import { type Logger, consoleLogger } from '@/lib/logger';
import { toError } from '@/lib/errors';
import { parseArtwork } from '@/features/parser/utils/artworkParser';
import { buildPolygons } from '@/features/geometry/utils/geometryBuilder';
import { classifyContours } from '@/features/geometry/utils/contourClassifier';
import { boundsOf, mergeBounds } from '@/features/geometry/utils/polygon';
import { PathPlanner } from '@/features/planner/utils/pathPlanner';
import { mirrorPasses } from '@/features/planner/utils/mirror';
import { MotionEmitter, type OutputState, closeOutput, createOutputState } from '@/features/gcode/utils/motionEmitter';
import { GcodeWriter } from '@/features/gcode/utils/gcodeWriter';

export interface PipelineOptions {
    logger?: Logger;
    writer?: GcodeWriter;
}

export type PreparedArtwork =
    | { ok: true; parsed: ParsedArtwork; polygons: Polygon[]; notices: string[] }
    | { ok: false; error: unknown };

const prepareArtwork = (source: ArtworkSource): PreparedArtwork => {
    try {
        const parsed = parseArtwork(source);
        const built = buildPolygons(parsed.primitives);
        return { ok: true, parsed, polygons: built.polygons, notices: [...parsed.notices, ...built.notices] };
    } catch (error) {
        return { ok: false, error };
    }
};

/**
 * Parses every artwork source of the project once. Failures are kept and
 * reported by the stages that use the source.
 */
export const prepareProject = (project: ForgeProject): Map<string, PreparedArtwork> => {
    const prepared = new Map<string, PreparedArtwork>();
    for (const file of project.files) {
        for (const stage of file.stages) {
            for (const source of stage.artwork) {
                if (!prepared.has(source.name)) {
                    prepared.set(source.name, prepareArtwork(source));
                }
            }
        }
    }
    return prepared;
};

/**
 * X coordinate backside passes are mirrored about: the middle of all
 * artwork when aligning, otherwise the origin.
 */
export const mirrorAxis = (project: ForgeProject, prepared: Map<string, PreparedArtwork>): number => {
    if (!project.alignBackside) return 0;
    let bounds: Bounds | null = null;
    for (const artwork of prepared.values()) {
        if (!artwork.ok || artwork.polygons.length === 0) continue;
        const own = boundsOf(artwork.polygons.flatMap((polygon) => polygon.ring));
        bounds = bounds ? mergeBounds(bounds, own) : own;
    }
    return bounds ? (bounds.minX + bounds.maxX) / 2 : 0;
};

export class StagePipeline {
    private readonly logger: Logger;
    private readonly writer: GcodeWriter;

    constructor(options: PipelineOptions = {}) {
        this.logger = options.logger ?? consoleLogger;
        this.writer = options.writer ?? new GcodeWriter();
    }

    /**
     * Builds every output file. Files are independent: one failing does not
     * stop the others, and a failed file yields no G-code at all.
     */
    async run(project: ForgeProject): Promise<OutputFileResult[]> {
        const prepared = prepareProject(project);
        const axis = mirrorAxis(project, prepared);
        return Promise.all(project.files.map((file) => this.runFile(file, prepared, axis)));
    }

    private async runFile(file: OutputFileSpec, prepared: Map<string, PreparedArtwork>, axis: number): Promise<OutputFileResult> {
        const buffer: Instruction[] = [];
        const reports: StageReport[] = [];
        const notices: string[] = [];
        const output = createOutputState();

        try {
            for (const stage of file.stages) {
                const report = this.runStage(stage, prepared, axis, output, buffer);
                reports.push(report);
                notices.push(...report.notices);
            }
            buffer.push(...closeOutput(output), { op: 'end' });
        } catch (error) {
            const err = toError(error);
            this.logger.error(`[pipeline] ${file.name}: ${err.message}`);
            return { name: file.name, ok: false, error: err, notices };
        }

        for (const notice of notices) {
            this.logger.warn(`[pipeline] ${file.name}: ${notice}`);
        }
        this.logger.info(`[pipeline] ${file.name}: ${file.stages.length} stage(s), ${buffer.length} instructions`);
        return {
            name: file.name,
            ok: true,
            instructions: buffer,
            gcode: this.writer.generate(buffer),
            stages: reports,
            notices,
        };
    }

    private runStage(
        stage: Stage,
        prepared: Map<string, PreparedArtwork>,
        axis: number,
        output: OutputState,
        buffer: Instruction[]
    ): StageReport {
        const polygons: Polygon[] = [];
        const notices: string[] = [];
        for (const source of stage.artwork) {
            const artwork = prepared.get(source.name) ?? prepareArtwork(source);
            if (!artwork.ok) throw artwork.error;
            polygons.push(...artwork.polygons);
            notices.push(...artwork.notices);
        }

        const forest = classifyContours(polygons);
        notices.push(...forest.notices);

        const plan = PathPlanner.plan(stage, forest);
        notices.push(...plan.notices);

        // Inversion already happened in planning; mirroring comes last.
        const passes = stage.backside ? mirrorPasses(plan.passes, axis) : plan.passes;
        buffer.push(...new MotionEmitter(stage.machine, output).emit(stage, plan, passes));

        return { stage: stage.name, forest: plan.forest, passes: passes.length, notices };
    }
}

export const runProject = (project: ForgeProject, options: PipelineOptions = {}): Promise<OutputFileResult[]> =>
    new StagePipeline(options).run(project);
