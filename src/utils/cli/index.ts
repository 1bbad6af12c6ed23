import type { Command } from "commander";
import pc from "picocolors";

/**
 * Show help after usage errors and list each subcommand's options under the
 * parent's help. Call once on the root program after every command is registered.
 */
export function enhanceHelp(cmd: Command): void {
    cmd.showHelpAfterError(true);

    if (cmd.commands.length > 0) {
        cmd.addHelpText("after", () => {
            const lines: string[] = [];
            for (const sub of cmd.commands) {
                const opts = sub.options.filter((o) => o.long !== "--help");
                if (opts.length === 0) {
                    continue;
                }
                lines.push(`\n  ${pc.bold(sub.name())}:`);
                for (const opt of opts) {
                    lines.push(`    ${pc.dim(opt.flags.padEnd(30))} ${opt.description}`);
                }
            }
            return lines.length > 0 ? [pc.dim("\nSubcommand Options:"), ...lines].join("\n") : "";
        });
    }

    for (const sub of cmd.commands) {
        enhanceHelp(sub);
    }
}
