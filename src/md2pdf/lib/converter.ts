import { existsSync } from "node:fs";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import logger from "@app/logger";
import { ConversionError } from "@app/md2pdf/errors";
import type { Renderer } from "@app/md2pdf/renderers";
import type { ConversionResult, ConvertOptions } from "@app/md2pdf/types";
import { buildHtml } from "./html-builder";
import { normalizeLists } from "./list-normalizer";

export const PAGE_BREAK = '\n\n<div class="page-break"></div>\n\n';

/** Files shared by every input of a run, read once up front */
export interface DocumentAssets {
    css?: string;
    cover?: string;
}

export function replaceExtension(path: string, extension: string): string {
    return join(dirname(path), `${basename(path, extname(path))}${extension}`);
}

export function outputPathFor(inputPath: string, output?: string): string {
    return output ? resolve(output) : replaceExtension(inputPath, ".pdf");
}

/**
 * `file://` URL of the directory containing `filePath`, with the trailing slash
 * `<base href>` needs to resolve relative links inside that directory.
 */
export function directoryUrl(filePath: string): string {
    const href = pathToFileURL(dirname(filePath)).href;
    return href.endsWith("/") ? href : `${href}/`;
}

/**
 * Place the cover (if any) in front of the document, separated by a forced page break.
 */
export function composeDocument(markdown: string, cover?: string): string {
    const parts = cover === undefined ? [markdown] : [`${cover}${PAGE_BREAK}`, markdown];
    return parts.join("\n\n");
}

async function readRequired(path: string, label: string): Promise<string> {
    const fullPath = resolve(path);
    if (!existsSync(fullPath)) {
        throw new ConversionError(`${label} not found: ${fullPath}`);
    }
    return readFile(fullPath, "utf-8");
}

export async function loadAssets(options: Pick<ConvertOptions, "css" | "cover">): Promise<DocumentAssets> {
    return {
        css: options.css ? await readRequired(options.css, "CSS") : undefined,
        cover: options.cover ? await readRequired(options.cover, "Cover") : undefined,
    };
}

/**
 * Convert one Markdown file. Missing inputs and render failures are reported
 * in the result rather than thrown, so a batch keeps going.
 */
export async function convertFile(
    inputPath: string,
    options: ConvertOptions,
    renderer: Renderer,
    assets: DocumentAssets
): Promise<ConversionResult> {
    if (!existsSync(inputPath)) {
        logger.warn(`Input not found: ${inputPath}, skipping`);
        return { input: inputPath, status: "skipped", error: "Input not found" };
    }

    const outputPath = outputPathFor(inputPath, options.output);
    await mkdir(dirname(outputPath), { recursive: true });

    const baseUrl = directoryUrl(inputPath);
    const markdown = normalizeLists(composeDocument(await readFile(inputPath, "utf-8"), assets.cover));
    const html = buildHtml(markdown, {
        title: options.title,
        theme: options.theme,
        pageSize: options.pageSize,
        margin: options.margin,
        math: options.math,
        mermaid: options.mermaid,
        baseUrl,
        css: assets.css,
    });

    if (options.debugHtml) {
        const htmlPath = replaceExtension(outputPath, ".html");
        await writeFile(htmlPath, html, "utf-8");
        logger.info(`HTML written: ${htmlPath}`);
    }

    logger.debug(`Rendering ${inputPath} with ${renderer.name}`);
    const started = performance.now();
    try {
        await renderer.render(html, outputPath, {
            baseUrl,
            pageSize: options.pageSize,
            margin: options.margin,
            math: options.math,
            mermaid: options.mermaid,
        });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to render ${inputPath}: ${message}`);
        return { input: inputPath, output: outputPath, status: "failed", error: message };
    }

    const { size } = await stat(outputPath);
    return {
        input: inputPath,
        output: outputPath,
        status: "ok",
        bytes: size,
        durationMs: performance.now() - started,
    };
}

/**
 * Convert every input in order with a single renderer.
 * @param onResult - Called as each file finishes
 */
export async function convertFiles(
    inputs: string[],
    options: ConvertOptions,
    renderer: Renderer,
    onResult?: (result: ConversionResult) => void
): Promise<ConversionResult[]> {
    if (inputs.length > 1 && options.output) {
        throw new ConversionError("The -o/--output option is not supported when converting multiple files");
    }

    const assets = await loadAssets(options);
    const results: ConversionResult[] = [];

    for (const input of inputs) {
        const result = await convertFile(resolve(input), options, renderer, assets);
        results.push(result);
        onResult?.(result);
    }

    return results;
}
