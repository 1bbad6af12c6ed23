import type { EngineName, MathMode } from "@app/md2pdf/types";

export interface RenderOptions {
    /** `file://` URL of the source directory, for relative images and links */
    baseUrl: string;
    pageSize: string;
    /** CSS margin shorthand */
    margin: string;
    math: MathMode;
    mermaid: boolean;
}

export abstract class Renderer {
    abstract name: EngineName;
    abstract description: string;
    /** Whether in-page JavaScript (Mermaid, MathJax, KaTeX) runs before export */
    abstract runsScripts: boolean;

    abstract isAvailable(): Promise<boolean>;

    abstract render(html: string, outputPath: string, options: RenderOptions): Promise<void>;
}
