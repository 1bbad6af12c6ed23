export interface PageMargin {
    top: string;
    right: string;
    bottom: string;
    left: string;
}

export const DEFAULT_MARGIN = "20mm";

/**
 * Expand a CSS margin shorthand (1–4 values) into its four sides.
 */
export function parseMargin(margin: string): PageMargin {
    const parts = margin.split(/\s+/).filter((part) => part.length > 0);
    const top = parts[0] ?? DEFAULT_MARGIN;
    const right = parts[1] ?? top;
    const bottom = parts[2] ?? top;
    const left = parts[3] ?? right;
    return { top, right, bottom, left };
}
