import minimist from "minimist";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import pino from "pino";
import pretty from "pino-pretty";

const args = minimist(process.argv.slice(2), {
    boolean: ["verbose"],
    alias: {
        v: "verbose",
    },
    default: {
        verbose: false,
    },
});

export const getLogLevel = (): pino.LevelWithSilent => {
    if (process.env.LOG_TRACE === "1") return "trace";
    if (process.env.LOG_DEBUG === "1") return "debug";
    if (process.env.LOG_SILENT === "1") return "silent";
    if (process.argv.includes("-vv")) {
        return "trace";
    } else if (args.verbose) {
        return "debug";
    }

    return "info";
};

export interface LoggerOptions {
    level: pino.LevelWithSilent;
    /** Extra file destination, written synchronously */
    logFile?: string;
    includeTimestamp?: boolean;
    colorize?: boolean;
}

export const createLogger = (options: LoggerOptions): pino.Logger => {
    const { level, logFile, includeTimestamp = false, colorize = process.stderr.isTTY === true } = options;

    // multistream levels exclude "silent"; the logger level already mutes everything then
    const streamLevel: pino.Level = level === "silent" ? "fatal" : level;

    const streams: pino.StreamEntry[] = [
        {
            // stdout is reserved for results, diagnostics go to stderr
            stream: pretty({
                colorize,
                destination: 2,
                sync: true,
                translateTime: includeTimestamp ? "SYS:standard" : false,
                ignore: "pid,hostname",
            }),
            level: streamLevel,
        },
    ];

    if (logFile) {
        mkdirSync(dirname(logFile), { recursive: true });
        streams.push({
            stream: pino.destination({ dest: logFile, sync: true }),
            level: streamLevel,
        });
    }

    return pino(
        {
            level,
            base: null,
            timestamp: includeTimestamp ? pino.stdTimeFunctions.isoTime : false,
        },
        pino.multistream(streams)
    );
};

const logger = createLogger({
    level: getLogLevel(),
    logFile: process.env.MD2PDF_LOG_FILE || undefined,
    includeTimestamp: process.env.MD2PDF_LOG_FILE !== undefined,
});

export default logger;
