export type EngineLogLevel = 'INFO' | 'VERBOSE' | 'DEBUG' | 'CRITICAL';
export type EngineLogChannel = 'COMBAT' | 'HEALING' | 'CONFIG' | 'SYSTEM';

export const DEFAULT_MESSAGE_LIMIT = 50;

const TAG_PATTERN = /^\[(INFO|VERBOSE|DEBUG|CRITICAL)\|([A-Z_]+)\]\s*/i;

// Lower rank = more important. A threshold records its own rank and everything below it.
const LEVEL_RANK: Record<EngineLogLevel, number> = {
    CRITICAL: 0,
    INFO: 1,
    VERBOSE: 2,
    DEBUG: 3
};

export const isEngineLogLevel = (value: string): value is EngineLogLevel =>
    Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);

export const shouldRecord = (level: EngineLogLevel, threshold: EngineLogLevel): boolean =>
    LEVEL_RANK[level] <= LEVEL_RANK[threshold];

export const isTaggedMessage = (text: string): boolean => TAG_PATTERN.test(text);

export const tagMessage = (
    text: string,
    level: EngineLogLevel = 'INFO',
    channel: EngineLogChannel = 'SYSTEM'
): string => {
    if (!text) return '';
    if (isTaggedMessage(text)) return text;
    return `[${level}|${channel}] ${text}`;
};

export const appendTaggedMessage = (
    existing: readonly string[] | undefined,
    text: string,
    level: EngineLogLevel,
    channel: EngineLogChannel,
    limit: number = DEFAULT_MESSAGE_LIMIT
): string[] => {
    if (limit <= 0) return [];
    const next = tagMessage(text, level, channel);
    const base = [...(existing || [])];
    if (!next || base[base.length - 1] === next) return base.slice(-limit);
    return [...base, next].slice(-limit);
};
