import { resolve } from "node:path";
import chokidar from "chokidar";
import { type Command, Option } from "commander";
import pc from "picocolors";
import logger from "@app/logger";
import { type CliFlags, loadStoredConfig, resolveOptions } from "@app/md2pdf/config";
import { ConversionError } from "@app/md2pdf/errors";
import { convertFiles } from "@app/md2pdf/lib/converter";
import { type Renderer, selectRenderer } from "@app/md2pdf/renderers";
import { type ConversionResult, type ConvertOptions, ENGINE_PREFERENCES, MATH_MODES, THEME_NAMES } from "@app/md2pdf/types";
import { formatBytes, formatDuration } from "@app/utils/format";
import type { Storage } from "@app/utils/storage";

interface ConvertFlags extends CliFlags {
    watch?: boolean;
    verbose?: boolean;
}

function printResult(result: ConversionResult): void {
    if (result.status !== "ok" || !result.output) {
        return;
    }
    const details = [
        result.bytes !== undefined ? formatBytes(result.bytes) : undefined,
        result.durationMs !== undefined ? formatDuration(result.durationMs) : undefined,
    ].filter((part) => part !== undefined);
    console.log(`${pc.green("✔")} PDF generated: ${result.output} ${pc.dim(`(${details.join(", ")})`)}`);
}

function printSummary(results: ConversionResult[]): void {
    const ok = results.filter((r) => r.status === "ok").length;
    const failed = results.filter((r) => r.status === "failed").length;
    const skipped = results.filter((r) => r.status === "skipped").length;
    const parts = [pc.green(`${ok} converted`)];
    if (failed > 0) parts.push(pc.red(`${failed} failed`));
    if (skipped > 0) parts.push(pc.yellow(`${skipped} skipped`));
    console.log(`\n${parts.join(pc.dim(", "))}`);
}

function warnAboutScripts(renderer: Renderer, options: ConvertOptions): void {
    if (!renderer.runsScripts && (options.math !== "none" || options.mermaid)) {
        logger.warn(
            `Using ${renderer.name}: JavaScript-based features (Mermaid/MathJax/KaTeX) will not render. ` +
                "Pass --math none --no-mermaid to silence this warning."
        );
    }
}

function watchInput(input: string, options: ConvertOptions, renderer: Renderer): void {
    const filePath = resolve(input);
    console.log(pc.dim(`\n--- Watching ${filePath} for changes (Ctrl+C to stop) ---\n`));

    const watcher = chokidar.watch(filePath, { ignoreInitial: true });
    watcher.on("change", () => {
        logger.debug(`Changed: ${filePath}`);
        convertFiles([filePath], options, renderer, printResult).then(
            () => undefined,
            (error: unknown) => {
                logger.error(`Re-render failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        );
    });
}

export function registerConvertAction(program: Command, storage: Storage): void {
    program
        .argument("[inputs...]", "Markdown file(s) to convert")
        .option("-o, --output <file>", "Output PDF file (single input only)")
        .option("--title <title>", "Document title (default: Document)")
        .option("--css <file>", "Additional CSS file, applied after the theme")
        .addOption(new Option("--engine <name>", "Render engine (default: auto)").choices(ENGINE_PREFERENCES))
        .option("--page-size <size>", "Page size, e.g. A4, Letter (default: A4)")
        .option("--margin <margin>", "Page margin, CSS shorthand: top right bottom left (default: 20mm)")
        .addOption(new Option("--math <mode>", "Math rendering (default: mathjax)").choices(MATH_MODES))
        .option("--mermaid", "Render Mermaid diagrams (default)")
        .option("--no-mermaid", "Disable Mermaid rendering")
        .option("--cover <file>", "Markdown file rendered as a cover page before each input")
        .addOption(new Option("--theme <name>", "Styling theme (default: mpe)").choices(THEME_NAMES))
        .option("--debug-html", "Write the intermediate HTML next to each PDF")
        .option("-w, --watch", "Re-render when the input changes (single input only)")
        .option("-v, --verbose", "Verbose logging (-vv for trace)")
        .action(async (inputs: string[], flags: ConvertFlags) => {
            if (inputs.length === 0) {
                program.help();
            }
            if (flags.watch && inputs.length !== 1) {
                throw new ConversionError("--watch takes exactly one input file");
            }

            const options = resolveOptions(flags, await loadStoredConfig(storage));
            logger.debug(`Options: ${JSON.stringify(options)}`);

            const renderer = await selectRenderer(options.engine);
            warnAboutScripts(renderer, options);

            const results = await convertFiles(inputs, options, renderer, printResult);
            if (results.length > 1) {
                printSummary(results);
            }

            if (flags.watch) {
                watchInput(inputs[0], options, renderer);
                return;
            }

            if (results.some((r) => r.status !== "ok")) {
                process.exitCode = 1;
            }
        });
}
