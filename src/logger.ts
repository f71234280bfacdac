// src/logger.ts
// Логи — JSON в stderr, чтобы stdout оставался чистым диалогом
import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./config";

export type { Logger } from "pino";

export function makeLogger(level: LogLevel): Logger {
    return pino(
        {
            level,
            base: { app: "weather-time-chat" },
            messageKey: "msg",
            timestamp: pino.stdTimeFunctions.isoTime,
            redact: { paths: ["apiKey", "*.apiKey"], censor: "[REDACTED]" },
        },
        pino.destination({ dest: 2, sync: true }),
    );
}

// Для тестов: тот же тип, без вывода
export function makeNoopLogger(): Logger {
    return pino({ enabled: false });
}
