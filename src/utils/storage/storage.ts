import { existsSync, mkdirSync, unlinkSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import logger from "@app/logger";

/**
 * Root directory for md2pdf state: $MD2PDF_HOME, or ~/.md2pdf
 */
export function defaultStorageRoot(): string {
    return process.env.MD2PDF_HOME || join(homedir(), ".md2pdf");
}

export class Storage {
    private baseDir: string;
    private configPath: string;

    /**
     * @param baseDir - Directory holding config.json (defaults to {@link defaultStorageRoot})
     */
    constructor(baseDir: string = defaultStorageRoot()) {
        this.baseDir = baseDir;
        this.configPath = join(this.baseDir, "config.json");
    }

    getConfigPath(): string {
        return this.configPath;
    }

    ensureDirs(): void {
        if (!existsSync(this.baseDir)) {
            mkdirSync(this.baseDir, { recursive: true });
            logger.debug(`Created directory: ${this.baseDir}`);
        }
    }

    // ============================================
    // Config Management
    // ============================================

    /**
     * Read the raw config object. Callers validate the shape.
     * @returns The parsed JSON, or null if the file is missing or unreadable
     */
    async getConfig(): Promise<unknown> {
        if (!existsSync(this.configPath)) {
            return null;
        }
        try {
            const content = await readFile(this.configPath, "utf-8");
            const parsed: unknown = JSON.parse(content);
            return parsed;
        } catch (error) {
            logger.error(`Failed to read config ${this.configPath}: ${error}`);
            return null;
        }
    }

    async setConfig(config: object): Promise<void> {
        this.ensureDirs();
        await writeFile(this.configPath, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
        logger.debug("Config saved");
    }

    /**
     * Clear the config (delete config.json)
     */
    clearConfig(): void {
        if (existsSync(this.configPath)) {
            unlinkSync(this.configPath);
            logger.debug("Config cleared");
        }
    }
}
