import path from 'path';
import process from 'process';
import fs from 'fs';
import { z } from 'zod';
import { LOG_LEVELS, logger } from './utils/logger.js';

export const CONFIG_FILE = path.join(process.cwd(), 'config.json');

export const DEFAULT_HEADER_STYLE = 'Heading 1';

/** Environment variable that overrides the configured log level. */
export const LOG_LEVEL_ENV = 'DOCX_TOOLS_LOG_LEVEL';

const ConfigSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).default('info'),
    defaultHeaderStyle: z.string().min(1).default(DEFAULT_HEADER_STYLE),
});

export type Config = z.infer<typeof ConfigSchema>;

function defaultConfig(): Config {
    return ConfigSchema.parse({});
}

function applyEnvironment(config: Config, env: NodeJS.ProcessEnv): Config {
    const level = env[LOG_LEVEL_ENV];
    if (!level) return config;

    const parsed = z.enum(LOG_LEVELS).safeParse(level.toLowerCase());
    if (!parsed.success) {
        logger.warn(`Ignoring ${LOG_LEVEL_ENV}=${level}: expected one of ${LOG_LEVELS.join(', ')}`);
        return config;
    }
    return { ...config, logLevel: parsed.data };
}

// Load configuration
export function loadConfig(configFile: string = CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): Config {
    let config = defaultConfig();

    try {
        if (fs.existsSync(configFile)) {
            const configContent = fs.readFileSync(configFile, 'utf8');
            const parsed = ConfigSchema.safeParse(JSON.parse(configContent));
            if (parsed.success) {
                config = parsed.data;
            } else {
                logger.error(`Invalid config in ${configFile}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
            }
        }
    } catch (error) {
        logger.error(`Error loading config: ${error instanceof Error ? error.message : String(error)}`);
    }

    return applyEnvironment(config, env);
}

let currentConfig: Config | null = null;

/** Config of the running process, loaded on first use. */
export function getConfig(): Config {
    if (!currentConfig) currentConfig = loadConfig();
    return currentConfig;
}

export function setConfig(config: Config): void {
    currentConfig = config;
}
