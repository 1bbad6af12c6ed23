import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConversionError } from "@app/md2pdf/errors";
import { Renderer, type RenderOptions } from "@app/md2pdf/renderers";
import type { ConversionResult, ConvertOptions } from "@app/md2pdf/types";
import {
    composeDocument,
    convertFiles,
    directoryUrl,
    outputPathFor,
    PAGE_BREAK,
    replaceExtension,
} from "./converter";

const FAKE_PDF = "%PDF-1.4 fake";

interface RenderCall {
    html: string;
    outputPath: string;
    options: RenderOptions;
}

class FakeRenderer extends Renderer {
    name = "weasyprint" as const;
    description = "writes a placeholder file";
    runsScripts = false;
    calls: RenderCall[] = [];

    constructor(private failFor: string[] = []) {
        super();
    }

    async isAvailable(): Promise<boolean> {
        return true;
    }

    async render(html: string, outputPath: string, options: RenderOptions): Promise<void> {
        this.calls.push({ html, outputPath, options });
        if (this.failFor.some((name) => outputPath.endsWith(name))) {
            throw new Error("engine crashed");
        }
        await writeFile(outputPath, FAKE_PDF);
    }
}

const defaults: ConvertOptions = {
    title: "Document",
    engine: "auto",
    pageSize: "A4",
    margin: "20mm",
    math: "none",
    mermaid: false,
    theme: "minimal",
    debugHtml: false,
};

describe("path helpers", () => {
    it("swaps the last extension for .pdf", () => {
        expect(outputPathFor("/a/b/doc.md")).toBe("/a/b/doc.pdf");
        expect(outputPathFor("/a/b/archive.tar.md")).toBe("/a/b/archive.tar.pdf");
        expect(outputPathFor("/a/b/notes")).toBe("/a/b/notes.pdf");
    });

    it("resolves an explicit output path", () => {
        expect(outputPathFor("/a/b/doc.md", "out/x.pdf")).toBe(resolve("out/x.pdf"));
    });

    it("replaces extensions", () => {
        expect(replaceExtension("/out/doc.pdf", ".html")).toBe("/out/doc.html");
    });

    it("builds a directory url with a trailing slash", () => {
        expect(directoryUrl("/docs/guide/readme.md")).toBe("file:///docs/guide/");
        expect(directoryUrl("/docs/my notes/a.md")).toBe("file:///docs/my%20notes/");
    });
});

describe("composeDocument", () => {
    it("returns the document alone without a cover", () => {
        expect(composeDocument("body")).toBe("body");
    });

    it("puts the cover and a page break first", () => {
        expect(composeDocument("body", "cover")).toBe(`cover${PAGE_BREAK}\n\nbody`);
        expect(composeDocument("body", "cover")).toBe('cover\n\n<div class="page-break"></div>\n\n\n\nbody');
    });
});

describe("convertFiles", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "md2pdf-convert-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("normalizes, renders and writes a pdf next to the input", async () => {
        const input = join(dir, "doc.md");
        await writeFile(input, "Intro\n* a\n* b\n");
        const renderer = new FakeRenderer();

        const [result] = await convertFiles([input], defaults, renderer);

        expect(result).toMatchObject({
            input,
            output: join(dir, "doc.pdf"),
            status: "ok",
            bytes: FAKE_PDF.length,
        });
        expect(await readFile(join(dir, "doc.pdf"), "utf-8")).toBe(FAKE_PDF);

        const [call] = renderer.calls;
        expect(call.html).toContain("<p>Intro</p>\n<ul>\n<li>a</li>\n<li>b</li>\n</ul>");
        expect(call.options).toEqual({
            baseUrl: `${pathToFileURL(dir).href}/`,
            pageSize: "A4",
            margin: "20mm",
            math: "none",
            mermaid: false,
        });
    });

    it("creates the directory of an explicit output", async () => {
        const input = join(dir, "doc.md");
        const output = join(dir, "out", "nested", "report.pdf");
        await writeFile(input, "# Report");

        const [result] = await convertFiles([input], { ...defaults, output }, new FakeRenderer());

        expect(result.status).toBe("ok");
        expect(existsSync(output)).toBe(true);
    });

    it("rejects an explicit output with several inputs before rendering", async () => {
        const renderer = new FakeRenderer();
        await expect(
            convertFiles([join(dir, "a.md"), join(dir, "b.md")], { ...defaults, output: join(dir, "x.pdf") }, renderer)
        ).rejects.toBeInstanceOf(ConversionError);
        expect(renderer.calls).toHaveLength(0);
    });

    it("skips missing inputs and keeps going", async () => {
        const present = join(dir, "present.md");
        await writeFile(present, "text");
        const seen: ConversionResult[] = [];

        const results = await convertFiles([join(dir, "missing.md"), present], defaults, new FakeRenderer(), (r) =>
            seen.push(r)
        );

        expect(results.map((r) => r.status)).toEqual(["skipped", "ok"]);
        expect(seen).toEqual(results);
    });

    it("records render failures and keeps going", async () => {
        await writeFile(join(dir, "bad.md"), "bad");
        await writeFile(join(dir, "good.md"), "good");

        const results = await convertFiles(
            [join(dir, "bad.md"), join(dir, "good.md")],
            defaults,
            new FakeRenderer(["bad.pdf"])
        );

        expect(results[0]).toEqual({
            input: join(dir, "bad.md"),
            output: join(dir, "bad.pdf"),
            status: "failed",
            error: "engine crashed",
        });
        expect(results[1].status).toBe("ok");
    });

    it("prepends the cover with a page break", async () => {
        const cover = join(dir, "cover.md");
        const input = join(dir, "doc.md");
        await writeFile(cover, "Cover page");
        await writeFile(input, "Body text");
        const renderer = new FakeRenderer();

        await convertFiles([input], { ...defaults, cover }, renderer);

        const { html } = renderer.calls[0];
        const coverIdx = html.indexOf("<p>Cover page</p>");
        const breakIdx = html.indexOf('<div class="page-break"></div>');
        const bodyIdx = html.indexOf("<p>Body text</p>");
        expect(coverIdx).toBeGreaterThan(-1);
        expect(breakIdx).toBeGreaterThan(coverIdx);
        expect(bodyIdx).toBeGreaterThan(breakIdx);
    });

    it("appends user css and fails early when it is missing", async () => {
        const input = join(dir, "doc.md");
        const css = join(dir, "print.css");
        await writeFile(input, "text");
        await writeFile(css, "h1 { color: teal; }");
        const renderer = new FakeRenderer();

        await convertFiles([input], { ...defaults, css }, renderer);
        expect(renderer.calls[0].html).toContain("h1 { color: teal; }");

        await expect(convertFiles([input], { ...defaults, css: join(dir, "nope.css") }, renderer)).rejects.toThrow(
            `CSS not found: ${join(dir, "nope.css")}`
        );
    });

    it("writes the intermediate html when asked", async () => {
        const input = join(dir, "doc.md");
        await writeFile(input, "text");
        const renderer = new FakeRenderer();

        await convertFiles([input], { ...defaults, debugHtml: true, title: "Notes" }, renderer);

        const written = await readFile(join(dir, "doc.html"), "utf-8");
        expect(written).toBe(renderer.calls[0].html);
        expect(written).toContain("<title>Notes</title>");
    });
});
