// src/config.ts
// Конфигурация читается один раз при старте и дальше передаётся явно
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
    OPENROUTER_API_KEY: z.string().min(1),
    WEATHER_API_KEY: z.string().min(1),
    IP_GEOLOCATION_API_KEY: z.string().min(1),

    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    MODEL: z.string().min(1).default("google/gemini-2.0-flash-001"),
    OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
    MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(10),

    WEATHER_API_URL: z.string().url().default("https://api.weatherapi.com/v1/current.json"),
    IP_GEOLOCATION_API_URL: z.string().url().default("https://api.ipgeolocation.io/timezone"),
});

export interface ProviderConfig {
    readonly apiKey: string;
    readonly endpoint: string;
}

export interface Config {
    readonly logLevel: LogLevel;
    readonly model: {
        readonly apiKey: string;
        readonly baseURL: string;
        readonly name: string;
    };
    readonly maxToolRounds: number;
    readonly weather: ProviderConfig;
    readonly geoLocation: ProviderConfig;
}

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env): Config {
    // Пустая строка в .env — то же самое, что отсутствие переменной
    const cleaned: Env = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== "") cleaned[key] = value;
    }

    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const missing: string[] = [];
        const invalid: string[] = [];
        for (const issue of parsed.error.issues) {
            const key = String(issue.path[0]);
            const bucket = cleaned[key] === undefined ? missing : invalid;
            if (!bucket.includes(key)) bucket.push(key);
        }
        throw new ConfigurationError({ missing, invalid });
    }

    const values = parsed.data;
    return Object.freeze({
        logLevel: values.LOG_LEVEL,
        model: Object.freeze({
            apiKey: values.OPENROUTER_API_KEY,
            baseURL: values.OPENROUTER_BASE_URL,
            name: values.MODEL,
        }),
        maxToolRounds: values.MAX_TOOL_ROUNDS,
        weather: Object.freeze({
            apiKey: values.WEATHER_API_KEY,
            endpoint: values.WEATHER_API_URL,
        }),
        geoLocation: Object.freeze({
            apiKey: values.IP_GEOLOCATION_API_KEY,
            endpoint: values.IP_GEOLOCATION_API_URL,
        }),
    });
}
