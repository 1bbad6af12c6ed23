import logger from "@app/logger";
import { EngineUnavailableError } from "@app/md2pdf/errors";
import { ENGINE_NAMES, type EngineName, type EnginePreference } from "@app/md2pdf/types";
import type { Renderer } from "./base";
import { PLAYWRIGHT_INSTALL_HINT, PlaywrightRenderer } from "./playwright";
import { WEASYPRINT_INSTALL_HINT, WeasyPrintRenderer } from "./weasyprint";

export type RendererFactories = Record<EngineName, () => Renderer>;

const defaultFactories: RendererFactories = {
    playwright: () => new PlaywrightRenderer(),
    weasyprint: () => new WeasyPrintRenderer(),
};

const INSTALL_HINTS: Record<EngineName, string> = {
    playwright: PLAYWRIGHT_INSTALL_HINT,
    weasyprint: WEASYPRINT_INSTALL_HINT,
};

export const NO_ENGINE_MESSAGE =
    "No PDF renderer available. Install Playwright ('npx playwright install chromium') or WeasyPrint ('pip install weasyprint')";

export interface EngineStatus {
    name: EngineName;
    description: string;
    available: boolean;
}

/**
 * Resolve an engine preference to a renderer that can run here.
 * "auto" tries Playwright first, then WeasyPrint.
 */
export async function selectRenderer(
    preference: EnginePreference,
    factories: RendererFactories = defaultFactories
): Promise<Renderer> {
    if (preference === "auto") {
        for (const name of ENGINE_NAMES) {
            const renderer = factories[name]();
            if (await renderer.isAvailable()) {
                logger.debug(`Auto-selected engine: ${name}`);
                return renderer;
            }
        }
        throw new EngineUnavailableError(NO_ENGINE_MESSAGE);
    }

    const renderer = factories[preference]();
    if (!(await renderer.isAvailable())) {
        throw new EngineUnavailableError(INSTALL_HINTS[preference]);
    }
    return renderer;
}

export async function listEngines(factories: RendererFactories = defaultFactories): Promise<EngineStatus[]> {
    const statuses: EngineStatus[] = [];
    for (const name of ENGINE_NAMES) {
        const renderer = factories[name]();
        statuses.push({ name, description: renderer.description, available: await renderer.isAvailable() });
    }
    return statuses;
}

export { Renderer, type RenderOptions } from "./base";
