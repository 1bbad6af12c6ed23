import type { Command } from "commander";
import pc from "picocolors";
import logger from "@app/logger";
import { loadStoredConfig, parseConfigValue } from "@app/md2pdf/config";
import type { Storage } from "@app/utils/storage";

export function registerConfigCommand(program: Command, storage: Storage): void {
    const config = program
        .command("config")
        .description("Show stored defaults, or change them with set/reset")
        .action(async () => {
            const stored = await loadStoredConfig(storage);
            console.log(pc.dim(storage.getConfigPath()));
            if (Object.keys(stored).length === 0) {
                console.log(pc.dim("(no stored defaults)"));
                return;
            }
            for (const [key, value] of Object.entries(stored)) {
                console.log(`  ${pc.cyan(key.padEnd(10))} ${String(value)}`);
            }
        });

    config
        .command("set")
        .description("Store a default, e.g. `config set theme github`")
        .argument("<key>", "title, engine, pageSize, margin, math, mermaid, theme, css or cover")
        .argument("<value>", "Value to store")
        .action(async (key: string, value: string) => {
            const update = parseConfigValue(key, value);
            const stored = await loadStoredConfig(storage);
            await storage.setConfig({ ...stored, ...update });
            logger.info(`Saved ${key} = ${value}`);
        });

    config
        .command("reset")
        .description("Remove all stored defaults")
        .action(() => {
            storage.clearConfig();
            logger.info("Stored defaults cleared");
        });
}
