import logger from "@app/logger";
import type { Storage } from "@app/utils/storage";
import { z } from "zod";
import { ConfigError } from "./errors";
import { type ConvertOptions, ENGINE_PREFERENCES, MATH_MODES, THEME_NAMES } from "./types";

export const storedConfigSchema = z
    .object({
        title: z.string().min(1),
        engine: z.enum(ENGINE_PREFERENCES),
        pageSize: z.string().min(1),
        margin: z.string().min(1),
        math: z.enum(MATH_MODES),
        mermaid: z.boolean(),
        theme: z.enum(THEME_NAMES),
        css: z.string().min(1),
        cover: z.string().min(1),
    })
    .partial()
    .strict();

export type StoredConfig = z.infer<typeof storedConfigSchema>;
export type ConfigKey = keyof StoredConfig;

const configKeySchema = storedConfigSchema.keyof();

export const CONFIG_KEYS = configKeySchema.options;

export const DEFAULTS = {
    title: "Document",
    engine: "auto",
    pageSize: "A4",
    margin: "20mm",
    math: "mathjax",
    mermaid: true,
    theme: "mpe",
} as const satisfies Partial<ConvertOptions>;

/** Raw flags as commander hands them over; anything omitted falls back to config, then defaults */
export interface CliFlags {
    output?: string;
    title?: string;
    css?: string;
    engine?: string;
    pageSize?: string;
    margin?: string;
    math?: string;
    mermaid?: boolean;
    cover?: string;
    theme?: string;
    debugHtml?: boolean;
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
}

export function isConfigKey(key: string): key is ConfigKey {
    return configKeySchema.safeParse(key).success;
}

/**
 * Load stored defaults. A missing file yields {}, an invalid one is reported and ignored.
 */
export async function loadStoredConfig(storage: Storage): Promise<StoredConfig> {
    const raw = await storage.getConfig();
    if (raw === null) {
        return {};
    }

    const parsed = storedConfigSchema.safeParse(raw);
    if (!parsed.success) {
        logger.warn(`Ignoring invalid config ${storage.getConfigPath()}: ${formatIssues(parsed.error)}`);
        return {};
    }
    return parsed.data;
}

/**
 * Turn a `config set <key> <value>` pair into a validated partial config.
 */
export function parseConfigValue(key: string, value: string): StoredConfig {
    if (!isConfigKey(key)) {
        throw new ConfigError(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
    }

    let candidate: unknown = value;
    if (key === "mermaid") {
        if (value !== "true" && value !== "false") {
            throw new ConfigError(`Invalid value for mermaid: expected "true" or "false", got "${value}"`);
        }
        candidate = value === "true";
    }

    const parsed = storedConfigSchema.safeParse({ [key]: candidate });
    if (!parsed.success) {
        throw new ConfigError(`Invalid value for ${key}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Merge CLI flags over stored config over built-in defaults, validating enum flags.
 */
export function resolveOptions(flags: CliFlags, stored: StoredConfig): ConvertOptions {
    const merged = {
        title: flags.title ?? stored.title,
        engine: flags.engine ?? stored.engine,
        pageSize: flags.pageSize ?? stored.pageSize,
        margin: flags.margin ?? stored.margin,
        math: flags.math ?? stored.math,
        mermaid: flags.mermaid ?? stored.mermaid,
        theme: flags.theme ?? stored.theme,
        css: flags.css ?? stored.css,
        cover: flags.cover ?? stored.cover,
    };

    const parsed = storedConfigSchema.safeParse(
        Object.fromEntries(Object.entries(merged).filter(([, value]) => value !== undefined))
    );
    if (!parsed.success) {
        throw new ConfigError(`Invalid options: ${formatIssues(parsed.error)}`);
    }
    const options = parsed.data;

    return {
        title: options.title ?? DEFAULTS.title,
        engine: options.engine ?? DEFAULTS.engine,
        pageSize: options.pageSize ?? DEFAULTS.pageSize,
        margin: options.margin ?? DEFAULTS.margin,
        math: options.math ?? DEFAULTS.math,
        mermaid: options.mermaid ?? DEFAULTS.mermaid,
        theme: options.theme ?? DEFAULTS.theme,
        css: options.css,
        cover: options.cover,
        output: flags.output,
        debugHtml: flags.debugHtml ?? false,
    };
}
