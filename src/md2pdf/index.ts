#!/usr/bin/env tsx
import { Command } from "commander";
import logger from "@app/logger";
import { enhanceHelp } from "@app/utils/cli";
import { Storage } from "@app/utils/storage";
import { registerConfigCommand } from "./commands/config";
import { registerConvertAction } from "./commands/convert";
import { registerEnginesCommand } from "./commands/engines";
import { ConfigError, ConversionError, EngineUnavailableError } from "./errors";

const storage = new Storage();
const program = new Command();

program
    .name("md2pdf")
    .description("Convert Markdown to PDF with a headless browser or WeasyPrint")
    .version("1.0.0");

registerConvertAction(program, storage);
registerEnginesCommand(program);
registerConfigCommand(program, storage);
enhanceHelp(program);

function exitCodeFor(error: unknown): number {
    if (error instanceof EngineUnavailableError) return 2;
    return 1;
}

program.parseAsync().catch((error: unknown) => {
    if (error instanceof EngineUnavailableError || error instanceof ConversionError || error instanceof ConfigError) {
        logger.error(error.message);
    } else {
        logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    }
    process.exit(exitCodeFor(error));
});
