import type { Bounds, Polygon } from '~types/geometry';
import { boundsOf } from '@/features/geometry/utils/polygon';

export interface SvgRenderOptions {
    // Draws each ring's outline over its fill.
    outline?: boolean;
    // Space around the artwork in mm.
    margin?: number;
}

const fmt = (n: number): string => n.toFixed(4);

// Dark shapes go from red to yellow in drawing order, clear ones from blue to cyan.
const fillOf = (polygon: Polygon, index: number): string =>
    polygon.polarity === 'dark' ? `rgb(255, ${index % 255}, 0)` : `rgb(0, ${index % 255}, 255)`;

const pathOf = (polygon: Polygon): string =>
    `${polygon.ring.map((p, i) => `${i === 0 ? 'M' : 'L'} ${fmt(p.x)} ${fmt(p.y)}`).join(' ')} Z`;

/**
 * Draws the polygons built from one artwork file, for checking what the
 * parser and geometry builder made of it. Units are millimetres.
 */
export const renderPolygonsSvg = (polygons: Polygon[], options: SvgRenderOptions = {}): string => {
    const margin = options.margin ?? 1;
    const bounds: Bounds = polygons.length > 0
        ? boundsOf(polygons.flatMap((polygon) => polygon.ring))
        : { minX: 0, minY: 0, maxX: 0, maxY: 0 };
    const width = bounds.maxX - bounds.minX + 2 * margin;
    const height = bounds.maxY - bounds.minY + 2 * margin;
    const stroke = options.outline ? ' stroke="blue" stroke-width="0.02"' : '';

    let content = '';
    polygons.forEach((polygon, index) => {
        content += `<path d="${pathOf(polygon)}" fill="${fillOf(polygon, index)}" fill-opacity="0.5"${stroke} />`;
    });

    // SVG y runs downwards, so the drawing is flipped and the view box follows.
    const viewBox = [bounds.minX - margin, -bounds.maxY - margin, width, height].map(fmt).join(' ');
    return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox}" width="${fmt(width)}mm" height="${fmt(height)}mm">` +
        `<g transform="scale(1,-1)">${content}</g></svg>\n`;
};
