/** Requested backend cannot run on this machine (exit code 2) */
export class EngineUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "EngineUnavailableError";
    }
}

/** Invalid combination of inputs or options, detected before any rendering */
export class ConversionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConversionError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/** A backend process or browser failed to produce the PDF */
export class RenderError extends Error {
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(message: string, exitCode: number | null = null, stderr = "") {
        super(message);
        this.name = "RenderError";
        this.exitCode = exitCode;
        this.stderr = stderr;
    }
}
