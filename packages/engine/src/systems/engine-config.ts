import { DEFAULT_MESSAGE_LIMIT, isEngineLogLevel, type EngineLogLevel } from './engine-messages';

export interface EngineConfig {
    logLevel: EngineLogLevel;
    messageLimit: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    logLevel: 'INFO',
    messageLimit: DEFAULT_MESSAGE_LIMIT
};

type EnvLike = Record<string, string | undefined>;

const readProcessEnv = (): EnvLike =>
    typeof process !== 'undefined' && process.env ? process.env : {};

/**
 * Reads LAYERED_HEALTH_LOG_LEVEL and LAYERED_HEALTH_MESSAGE_LIMIT.
 * Unrecognised values fall back to the defaults.
 */
export const readEngineConfig = (env: EnvLike = readProcessEnv()): EngineConfig => {
    const rawLevel = env.LAYERED_HEALTH_LOG_LEVEL?.trim().toUpperCase();
    const rawLimit = Number(env.LAYERED_HEALTH_MESSAGE_LIMIT);
    return {
        logLevel: rawLevel && isEngineLogLevel(rawLevel) ? rawLevel : DEFAULT_ENGINE_CONFIG.logLevel,
        messageLimit: Number.isInteger(rawLimit) && rawLimit > 0 ? rawLimit : DEFAULT_ENGINE_CONFIG.messageLimit
    };
};
