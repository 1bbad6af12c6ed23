import { existsSync } from "node:fs";
import logger from "@app/logger";
import { EngineUnavailableError } from "@app/md2pdf/errors";
import type { Page } from "playwright";
import { Renderer, type RenderOptions } from "./base";
import { parseMargin } from "./margin";

type PlaywrightModule = typeof import("playwright");

const SCRIPT_TIMEOUT_MS = 5000;

export const PLAYWRIGHT_INSTALL_HINT =
    "Playwright is not available. Install it with 'npm install playwright' and run 'npx playwright install chromium'";

async function loadPlaywright(): Promise<PlaywrightModule | null> {
    try {
        return await import("playwright");
    } catch (error) {
        logger.debug(`Cannot load playwright: ${error}`);
        return null;
    }
}

/**
 * Wait for an in-page library to appear, then let it finish its work.
 * Absence or a timeout is not fatal: the page is exported as it stands.
 */
async function settle(page: Page, label: string, readyExpression: string, runExpression: string): Promise<void> {
    try {
        await page.waitForFunction(readyExpression, undefined, { timeout: SCRIPT_TIMEOUT_MS });
        await page.evaluate(runExpression);
    } catch (error) {
        logger.debug(`${label} did not settle: ${error}`);
    }
}

export class PlaywrightRenderer extends Renderer {
    name = "playwright" as const;
    description = "Headless Chromium via Playwright - runs Mermaid, MathJax and KaTeX";
    runsScripts = true;

    async isAvailable(): Promise<boolean> {
        const playwright = await loadPlaywright();
        if (!playwright) {
            return false;
        }
        const executable = playwright.chromium.executablePath();
        logger.debug(`Chromium executable: ${executable}`);
        return existsSync(executable);
    }

    async render(html: string, outputPath: string, options: RenderOptions): Promise<void> {
        const playwright = await loadPlaywright();
        if (!playwright) {
            throw new EngineUnavailableError(PLAYWRIGHT_INSTALL_HINT);
        }

        const browser = await playwright.chromium.launch();
        try {
            const page = await browser.newPage();
            await page.setContent(html, { waitUntil: "networkidle" });

            if (options.math === "mathjax") {
                await settle(page, "MathJax", "window.MathJax && MathJax.typesetPromise", "MathJax.typesetPromise()");
            }
            if (options.mermaid) {
                await settle(page, "Mermaid", "window.mermaid && mermaid.initialize", "window.mermaid.run()");
            }

            await page.pdf({
                path: outputPath,
                format: options.pageSize,
                margin: parseMargin(options.margin),
                printBackground: true,
            });
            logger.debug(`Chromium wrote ${outputPath}`);
        } finally {
            await browser.close();
        }
    }
}
