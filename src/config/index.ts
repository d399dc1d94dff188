import { ConfigError } from '../types/errors';

export type LlmProvider = 'openai' | 'gemini';

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
    openai: 'gpt-4o',
    gemini: 'gemini-1.5-flash'
};

export interface AppConfig {
    provider: LlmProvider;
    apiKey: string;
    model: string;
    // Only set when present in the environment
    baseUrl?: string;
    timeoutMs?: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
    const provider = parseProvider(env.LLM_PROVIDER);
    const apiKey = provider === 'openai'
        ? must(env, 'OPENAI_API_KEY')
        : must(env, 'GEMINI_API_KEY', 'API_KEY');

    const cfg: AppConfig = {
        provider,
        apiKey,
        model: env.LLM_MODEL?.trim() || DEFAULT_MODELS[provider]
    };

    const baseUrl = env.OPENAI_BASE_URL?.trim();
    if (provider === 'openai' && baseUrl) cfg.baseUrl = baseUrl.replace(/\/+$/, '');

    const timeout = env.LLM_TIMEOUT_MS?.trim();
    if (timeout) {
        const timeoutMs = Number.parseInt(timeout, 10);
        if (!/^\d+$/.test(timeout) || timeoutMs <= 0) {
            throw new ConfigError(`LLM_TIMEOUT_MS must be a positive integer, got "${timeout}"`);
        }
        cfg.timeoutMs = timeoutMs;
    }

    return cfg;
}

function parseProvider(raw: string | undefined): LlmProvider {
    const value = (raw ?? 'openai').trim().toLowerCase() || 'openai';
    if (value === 'openai' || value === 'gemini') return value;
    throw new ConfigError(`LLM_PROVIDER must be "openai" or "gemini", got "${raw}"`);
}

function must(env: Env, ...keys: string[]): string {
    for (const k of keys) {
        const v = env[k]?.trim();
        if (v) return v;
    }
    throw new ConfigError(`Missing environment variable: ${keys.join(' or ')}`);
}
