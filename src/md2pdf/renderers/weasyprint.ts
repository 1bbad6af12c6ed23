import { spawn } from "node:child_process";
import logger from "@app/logger";
import { RenderError } from "@app/md2pdf/errors";
import { Renderer, type RenderOptions } from "./base";

export const WEASYPRINT_BIN = "weasyprint";

export const WEASYPRINT_INSTALL_HINT =
    "WeasyPrint is not available. Install it with 'pip install weasyprint' and make sure 'weasyprint' is on PATH";

export interface ExecResult {
    code: number | null;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (program: string, args: string[], input?: string) => Promise<ExecResult>;

/**
 * Run a command without a shell, optionally feeding it stdin, and collect its output.
 * Rejects only when the process cannot be started.
 */
export const exec: CommandRunner = (program, args, input) => {
    return new Promise((resolve, reject) => {
        const child = spawn(program, args);

        let stdout = "";
        let stderr = "";

        child.stdout.setEncoding("utf8");
        child.stderr.setEncoding("utf8");

        child.stdout.on("data", (data: string) => {
            stdout += data;
        });

        child.stderr.on("data", (data: string) => {
            stderr += data;
        });

        child.on("close", (code) => {
            resolve({ code, stdout, stderr });
        });

        child.on("error", (error) => {
            reject(error);
        });

        // An early exit closes stdin under us; the exit code reports the failure
        child.stdin.on("error", (error) => {
            logger.debug(`${program} stdin closed: ${error.message}`);
        });
        child.stdin.end(input ?? "");
    });
};

/**
 * WeasyPrint reads page size and margins from the document's `@page` rule.
 */
export class WeasyPrintRenderer extends Renderer {
    name = "weasyprint" as const;
    description = "WeasyPrint CSS print engine - no JavaScript, so no Mermaid or math typesetting";
    runsScripts = false;

    constructor(private readonly run: CommandRunner = exec) {
        super();
    }

    async isAvailable(): Promise<boolean> {
        try {
            const { code, stdout } = await this.run(WEASYPRINT_BIN, ["--version"]);
            logger.debug(`weasyprint --version: ${stdout.trim()} (exit ${code})`);
            return code === 0;
        } catch (error) {
            logger.debug(`Cannot run ${WEASYPRINT_BIN}: ${error}`);
            return false;
        }
    }

    async render(html: string, outputPath: string, options: RenderOptions): Promise<void> {
        const args = options.baseUrl ? ["--base-url", options.baseUrl, "-", outputPath] : ["-", outputPath];
        logger.debug(`Running ${WEASYPRINT_BIN} ${args.join(" ")}`);

        const { code, stderr } = await this.run(WEASYPRINT_BIN, args, html);
        if (code !== 0) {
            throw new RenderError(`${WEASYPRINT_BIN} exited with code ${code}: ${stderr.trim()}`, code, stderr);
        }
        if (stderr.trim()) {
            logger.debug(stderr.trim());
        }
    }
}
