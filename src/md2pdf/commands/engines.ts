import type { Command } from "commander";
import pc from "picocolors";
import { listEngines } from "@app/md2pdf/renderers";

export function registerEnginesCommand(program: Command): void {
    program
        .command("engines")
        .description("List render engines and whether they can run here")
        .action(async () => {
            const engines = await listEngines();

            console.log(pc.bold("\nRender engines:\n"));
            for (const engine of engines) {
                const status = engine.available ? pc.green("available") : pc.red("missing  ");
                console.log(`  ${pc.cyan(engine.name.padEnd(12))} ${status}  ${pc.dim(engine.description)}`);
            }
            console.log();
        });
}
