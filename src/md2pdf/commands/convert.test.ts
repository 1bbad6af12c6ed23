import { existsSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConversionError } from "@app/md2pdf/errors";
import { type Renderer, type RenderOptions, selectRenderer } from "@app/md2pdf/renderers";
import type { EngineName } from "@app/md2pdf/types";
import { Storage } from "@app/utils/storage";
import { registerConvertAction } from "./convert";

const mocks = vi.hoisted(() => ({
    logger: {
        trace: vi.fn(),
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

vi.mock("@app/logger", () => ({ default: mocks.logger }));
vi.mock("@app/md2pdf/renderers", () => ({ selectRenderer: vi.fn() }));

interface FakeRenderer extends Renderer {
    rendered: RenderOptions[];
}

function fakeRenderer(name: EngineName, runsScripts: boolean): FakeRenderer {
    const rendered: RenderOptions[] = [];
    return {
        name,
        description: "writes a placeholder file",
        runsScripts,
        rendered,
        isAvailable: async () => true,
        render: async (_html: string, outputPath: string, options: RenderOptions) => {
            rendered.push(options);
            await writeFile(outputPath, "%PDF-1.4 fake");
        },
    };
}

describe("convert action", () => {
    let dir: string;
    let storage: Storage;
    let input: string;

    async function run(args: string[]): Promise<void> {
        const program = new Command().exitOverride();
        registerConvertAction(program, storage);
        await program.parseAsync(args, { from: "user" });
    }

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "md2pdf-convert-cli-"));
        storage = new Storage(join(dir, "home"));
        input = join(dir, "doc.md");
        await writeFile(input, "# Title\n* a\n* b\n");
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.mocked(selectRenderer).mockResolvedValue(fakeRenderer("playwright", true));
    });

    afterEach(async () => {
        process.exitCode = undefined;
        vi.restoreAllMocks();
        vi.clearAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it("converts an input and leaves the exit code unset", async () => {
        await run([input, "--engine", "playwright"]);

        expect(selectRenderer).toHaveBeenCalledWith("playwright");
        expect(existsSync(join(dir, "doc.pdf"))).toBe(true);
        expect(process.exitCode).toBeUndefined();
        expect(String(vi.mocked(console.log).mock.calls[0][0])).toContain(`PDF generated: ${join(dir, "doc.pdf")}`);
    });

    it("sets exit code 1 when an input is skipped", async () => {
        await run([input, join(dir, "missing.md")]);

        expect(existsSync(join(dir, "doc.pdf"))).toBe(true);
        expect(process.exitCode).toBe(1);
    });

    it("sets exit code 1 when an input fails to render", async () => {
        const renderer = fakeRenderer("playwright", true);
        renderer.render = async () => {
            throw new Error("engine crashed");
        };
        vi.mocked(selectRenderer).mockResolvedValue(renderer);

        await run([input]);

        expect(process.exitCode).toBe(1);
    });

    it("warns when the engine cannot run math or mermaid scripts", async () => {
        vi.mocked(selectRenderer).mockResolvedValue(fakeRenderer("weasyprint", false));

        await run([input, "--engine", "weasyprint"]);

        expect(mocks.logger.warn).toHaveBeenCalledWith(
            expect.stringContaining("Using weasyprint: JavaScript-based features (Mermaid/MathJax/KaTeX) will not render")
        );
    });

    it("does not warn when scripted features are off", async () => {
        vi.mocked(selectRenderer).mockResolvedValue(fakeRenderer("weasyprint", false));

        await run([input, "--math", "none", "--no-mermaid"]);

        expect(mocks.logger.warn).not.toHaveBeenCalled();
    });

    it("rejects --watch with more than one input before rendering", async () => {
        const other = join(dir, "other.md");
        await writeFile(other, "text");

        await expect(run([input, other, "--watch"])).rejects.toBeInstanceOf(ConversionError);
        expect(selectRenderer).not.toHaveBeenCalled();
    });

    it("lets stored mermaid apply unless a flag is given", async () => {
        await storage.setConfig({ mermaid: false, math: "none" });
        const renderer = fakeRenderer("playwright", true);
        vi.mocked(selectRenderer).mockResolvedValue(renderer);

        await run([input]);
        await run([input, "--mermaid"]);

        expect(renderer.rendered.map((options) => options.mermaid)).toEqual([false, true]);
        expect(renderer.rendered[0].math).toBe("none");
    });
});
