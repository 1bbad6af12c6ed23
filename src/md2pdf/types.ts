export const ENGINE_NAMES = ["playwright", "weasyprint"] as const;
export const ENGINE_PREFERENCES = ["auto", ...ENGINE_NAMES] as const;
export const MATH_MODES = ["none", "mathjax", "katex"] as const;
export const THEME_NAMES = ["mpe", "github", "minimal"] as const;

export type EngineName = (typeof ENGINE_NAMES)[number];
export type EnginePreference = (typeof ENGINE_PREFERENCES)[number];
export type MathMode = (typeof MATH_MODES)[number];
export type ThemeName = (typeof THEME_NAMES)[number];

/** Settings shared by every input of one run, after CLI flags and stored config are merged */
export interface ConvertOptions {
    title: string;
    engine: EnginePreference;
    pageSize: string;
    margin: string;
    math: MathMode;
    mermaid: boolean;
    theme: ThemeName;
    /** Path to extra CSS appended after the theme */
    css?: string;
    /** Markdown file placed before each input, followed by a page break */
    cover?: string;
    /** Explicit output path; only valid with a single input */
    output?: string;
    debugHtml: boolean;
}

export type ConversionStatus = "ok" | "skipped" | "failed";

export interface ConversionResult {
    input: string;
    output?: string;
    status: ConversionStatus;
    bytes?: number;
    durationMs?: number;
    error?: string;
}
