import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type SotaboardConfig,
    type MetadataFilterConfig,
    type FetchConfig,
    type ParseConfig,
    type ContentFilterConfig,
    type TargetConfig,
    type ExcerptConfig,
    type LlmConfig,
} from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Overrides accepted from the CLI: top-level fields plus partial nested sections.
 */
export type ConfigOverrides = Partial<
    Omit<SotaboardConfig, 'metadata' | 'fetch' | 'parse' | 'content' | 'target' | 'excerpt' | 'llm'>
> & {
    metadata?: Partial<MetadataFilterConfig>;
    fetch?: Partial<FetchConfig>;
    parse?: Partial<ParseConfig>;
    content?: Partial<ContentFilterConfig>;
    target?: Partial<TargetConfig>;
    excerpt?: Partial<ExcerptConfig>;
    llm?: Partial<LlmConfig>;
};

const NESTED_SECTIONS = ['metadata', 'fetch', 'parse', 'content', 'target', 'excerpt', 'llm'] as const;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const positiveInt = z.number().int().min(1);
const unlimitedOrCount = z.number().int().min(-1);

/**
 * Shape of a fully resolved configuration.
 */
export const configSchema: z.ZodType<SotaboardConfig> = z.object({
    snapshot: z.string().min(1),
    workDir: z.string().min(1),
    schemaVersion: z.string().min(1),
    metadata: z.object({
        keywordGroups: z.array(
            z.object({
                fields: z.array(z.enum(['title', 'abstract'])).min(1),
                keywords: z.array(z.string().min(1)).min(1),
            })
        ),
        categories: z.array(z.string().min(1)),
        dateFrom: isoDate.optional(),
        dateTo: isoDate.optional(),
        excludeTitleKeywords: z.array(z.string().min(1)),
        requireDoi: z.boolean(),
        maxScan: unlimitedOrCount,
    }),
    fetch: z.object({
        baseUrl: z.string().url(),
        concurrency: positiveInt,
        maxRetries: z.number().int().min(0),
        initialBackoffMs: z.number().min(0),
        maxBackoffMs: z.number().min(0),
        timeoutMs: positiveInt,
        maxDownloads: unlimitedOrCount,
        retryFailed: z.boolean(),
    }),
    parse: z.object({
        maxPages: z.number().int().min(0),
    }),
    content: z.object({
        keywords: z.array(z.string().min(1)),
        requiredSectionKeywords: z.array(z.string().min(1)),
        minTextLength: z.number().int().min(0),
    }),
    taxonomy: z.array(
        z.object({
            name: z.string().min(1),
            parent: z.string().min(1).nullable().optional(),
            aliases: z.array(z.string().min(1)).optional(),
            description: z.string().optional(),
        })
    ),
    target: z.object({
        topic: z.string(),
        benchmarks: z.array(z.string().min(1)),
        metrics: z.array(z.string().min(1)),
    }),
    excerpt: z.object({
        priorityKeywords: z.array(z.string().min(1)),
        excludeSections: z.array(z.string().min(1)),
    }),
    llm: z.object({
        provider: z.enum(['gemini', 'openai', 'ollama']),
        model: z.string().min(1),
        temperature: z.number().min(0).max(2),
        budget: unlimitedOrCount,
        concurrency: positiveInt,
        delayMs: z.number().min(0),
        maxRetries: z.number().int().min(0),
        initialBackoffMs: z.number().min(0),
        maxBackoffMs: z.number().min(0),
        timeoutMs: positiveInt,
        maxInputChars: z.number().int().min(1000),
        attachPdf: z.boolean(),
        repair: z.boolean(),
        force: z.boolean(),
        retryFailed: z.boolean(),
        baseUrl: z.string().url().optional(),
    }),
    format: z.enum(['csv', 'json', 'markdown']),
    out: z.string().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
});

/**
 * Load the config file using cosmiconfig.
 * An explicit path must exist; otherwise the search returning nothing is fine (defaults are used).
 */
async function loadConfigFile(explicitPath?: string): Promise<Record<string, unknown> | null> {
    const explorer = cosmiconfig('sotaboard', {
        searchPlaces: ['sotaboard.config.json', '.sotaboardrc.json', 'sotaboard.config.yaml'],
    });

    if (explicitPath) {
        try {
            const result = await explorer.load(explicitPath);
            return result && !result.isEmpty && isRecord(result.config) ? result.config : null;
        } catch (error) {
            throw new ConfigError(
                `Cannot read config file ${explicitPath}: ${error instanceof Error ? error.message : String(error)}`,
                'config'
            );
        }
    }

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty && isRecord(result.config)) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const snapshot = process.env['SOTABOARD_SNAPSHOT'];
    if (snapshot) env.snapshot = snapshot;

    const workDir = process.env['SOTABOARD_WORK_DIR'];
    if (workDir) env.workDir = workDir;

    const model = process.env['SOTABOARD_LLM_MODEL'];
    if (model) env.llm = { model };

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    configPath?: string
): Promise<SotaboardConfig> {
    const fileConfig = (await loadConfigFile(configPath)) ?? {};
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Deep-merge config layers over the defaults and validate the result.
 */
export function mergeConfig(
    fileConfig: Record<string, unknown>,
    envConfig: ConfigOverrides,
    cliFlags: ConfigOverrides
): SotaboardConfig {
    const merged: Record<string, unknown> = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...definedOnly(envConfig),
        ...definedOnly(cliFlags),
    };

    // Deep merge nested objects
    for (const section of NESTED_SECTIONS) {
        const fromFile = fileConfig[section];
        merged[section] = {
            ...DEFAULT_CONFIG[section],
            ...(isRecord(fromFile) ? fromFile : {}),
            ...definedOnly(envConfig[section] ?? {}),
            ...definedOnly(cliFlags[section] ?? {}),
        };
    }

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue ? issue.path.join('.') : 'config';
        throw new ConfigError(`Invalid configuration at ${field}: ${issue?.message ?? 'unknown error'}`, field);
    }

    return parsed.data;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Drop undefined values so unset CLI flags do not mask lower layers. */
function definedOnly(value: object): Record<string, unknown> {
    return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
