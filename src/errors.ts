// src/errors.ts
// Таксономия ошибок. Любая из них фатальна: ловится только в index.ts.

export type AppErrorCode =
    | "CONFIGURATION"
    | "NETWORK"
    | "PARSE"
    | "PROTOCOL"
    | "TOOL_EXECUTION";

export abstract class AppError extends Error {
    abstract readonly code: AppErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export interface ConfigurationErrorMeta {
    missing: string[];
    invalid: string[];
}

// Нет обязательной переменной окружения или значение не проходит схему
export class ConfigurationError extends AppError {
    readonly code = "CONFIGURATION";
    readonly meta: ConfigurationErrorMeta;

    constructor(meta: ConfigurationErrorMeta) {
        const parts: string[] = [];
        if (meta.missing.length > 0) parts.push(`не заданы ${meta.missing.join(", ")}`);
        if (meta.invalid.length > 0) parts.push(`некорректны ${meta.invalid.join(", ")}`);
        super(`Конфигурация: ${parts.join("; ")}`);
        this.meta = meta;
    }
}

// Запрос не выполнился или провайдер ответил не-2xx
export class NetworkError extends AppError {
    readonly code = "NETWORK";
    readonly status: number | undefined;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.status = options?.status;
    }
}

// Тело ответа не JSON или не той формы
export class ParseError extends AppError {
    readonly code = "PARSE";
}

// Модель нарушила контракт: неизвестный tool, кривые аргументы, пустой ответ
export class ProtocolError extends AppError {
    readonly code = "PROTOCOL";
}

export class ToolExecutionError extends AppError {
    readonly code = "TOOL_EXECUTION";
    readonly toolName: string;

    constructor(toolName: string, cause: unknown) {
        super(`Tool "${toolName}" не выполнился: ${describeError(cause)}`, { cause });
        this.toolName = toolName;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
