import type { Length } from '~types/units';
import { PlanningError } from '@/lib/errors';
import { length, toMillimeters } from '@/features/units/utils/unitValue';

export interface DepthSlices {
    depths: Length[];
    notices: string[];
}

/**
 * Pass depths from the surface down to `cutDepth`, each at most `passDepth`
 * below the previous one. The last pass lands exactly on `cutDepth`.
 */
export const sliceDepths = (cutDepth: Length, passDepth: Length, stage: string): DepthSlices => {
    const cut = toMillimeters(cutDepth);
    const step = toMillimeters(passDepth);

    if (!(step > 0)) {
        throw new PlanningError(stage, `pass depth must be positive, got ${step} mm`);
    }
    if (!(cut < 0)) {
        throw new PlanningError(stage, `cut depth must be below the surface (negative), got ${cut} mm; no pass would be planned`);
    }

    const total = Math.abs(cut);
    const exact = total / step;
    const count = Math.ceil(exact - 1e-9);
    const depths: Length[] = [];
    for (let k = 1; k < count; k++) {
        depths.push(length(-k * step));
    }
    depths.push(length(cut));

    const notices: string[] = [];
    if (Math.abs(exact - Math.round(exact)) > 1e-9) {
        notices.push(`Stage '${stage}': ${total} mm cut in ${count} passes, the last one shallower than ${step} mm`);
    }
    return { depths, notices };
};
